import { describe, expect, it } from "vitest";
import { ColumnCastError, columnNames, createTable } from "../../core";
import { cleanTable } from "./clean";

describe("cleanTable", () => {
    const decoded = createTable({
        estrato: { type: "float64", values: [1, Number.NaN, 3] },
        nombre: { type: "string", values: ["a", "b", "c"] },
        edad: { type: "int8", values: [10, 20, 30] },
    });

    it("should cast float columns to nullable integers", () => {
        expect(cleanTable(decoded).columns.get("ESTRATO")).toEqual({
            type: "Int64",
            values: [1, null, 3],
        });
    });

    it("should upper-case column names and keep their order", () => {
        expect(columnNames(cleanTable(decoded))).toEqual([
            "ESTRATO",
            "NOMBRE",
            "EDAD",
        ]);
    });

    it("should leave other column types untouched", () => {
        const cleaned = cleanTable(decoded);

        expect(cleaned.columns.get("NOMBRE")).toBe(decoded.columns.get("nombre"));
        expect(cleaned.columns.get("EDAD")).toBe(decoded.columns.get("edad"));
    });

    it("should change nothing on a clean table", () => {
        const once = cleanTable(decoded);

        expect(cleanTable(once)).toEqual(once);
    });

    it("should refuse a fractional float value", () => {
        const table = createTable({
            peso: { type: "float64", values: [1.5] },
        });

        expect(() => cleanTable(table)).toThrow(ColumnCastError);
    });
});
