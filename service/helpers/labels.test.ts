import { describe, expect, it } from "vitest";
import { createTable, emptyTable, toRecords } from "../../core";
import type { CensusTables, ParsedDictionary, SchemaIdentifier } from "../types";
import { applyLabels } from "./labels";

describe("applyLabels", () => {
    const valueLabels: Record<SchemaIdentifier, Record<string, Record<string, string>>> = {
        REGVIV: { ESTRATO: { "1": "Estrato bajo" } },
        REGHOG: {},
        REGFALL: {},
        REGPER: { P_SEXO: { "1": "Hombre", "2": "Mujer" } },
    };

    const requested: SchemaIdentifier[] = [];
    const dictionary: ParsedDictionary = {
        getColumnLabels: () => ({}),
        getValueLabels: (schemaId) => {
            requested.push(schemaId);
            return valueLabels[schemaId];
        },
    };

    const tables: CensusTables = {
        dwellings: createTable({
            ESTRATO: { type: "Int64", values: [1, 2, null] },
        }),
        households: createTable({ H_NRO: { type: "Int64", values: [1] } }),
        deaths: emptyTable(),
        persons: createTable({
            P_SEXO: { type: "Int64", values: [2, 1] },
            P_EDAD: { type: "Int64", values: [30, 1] },
        }),
        georeference: createTable({
            ESTRATO: { type: "Int64", values: [1] },
        }),
    };

    it("should replace labeled values and leave the rest", () => {
        const labeled = applyLabels(tables, dictionary);

        expect(toRecords(labeled.dwellings)).toEqual([
            { ESTRATO: "Estrato bajo" },
            { ESTRATO: 2 },
            { ESTRATO: null },
        ]);
        expect(toRecords(labeled.persons)).toEqual([
            { P_SEXO: "Mujer", P_EDAD: 30 },
            { P_SEXO: "Hombre", P_EDAD: 1 },
        ]);
        expect(labeled.households.columns.get("H_NRO")).toBe(
            tables.households.columns.get("H_NRO"),
        );
    });

    it("should pass the georeference table through untouched", () => {
        expect(applyLabels(tables, dictionary).georeference).toBe(
            tables.georeference,
        );
    });

    it("should query each labeled record in turn", () => {
        requested.length = 0;

        applyLabels(tables, dictionary);

        expect(requested).toEqual(["REGVIV", "REGHOG", "REGFALL", "REGPER"]);
    });
});
