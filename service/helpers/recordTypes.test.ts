import { describe, expect, it } from "vitest";
import { UnknownRecordTypeError } from "../errors";
import { RECORD_TYPES } from "../types";
import {
    isLabeledRecordType,
    mapFileNameToRecordType,
    mapRecordTypeToSchema,
} from "./recordTypes";

describe("recordTypes", () => {
    describe("mapFileNameToRecordType", () => {
        it.each([
            ["CNPV2018_1VIV_A2_05.dta", "dwellings"],
            ["CNPV2018_2HOG_A2_05.dta", "households"],
            ["CNPV2018_3FALL_A2_05.dta", "deaths"],
            ["CNPV2018_5PER_A2_05.dta", "persons"],
            ["CNPV2018_MGN_A2_05.dta", "georeference"],
        ])("should map %s to %s", (fileName, recordType) => {
            expect(mapFileNameToRecordType(fileName)).toBe(recordType);
        });

        it("should read the code from the base name", () => {
            expect(
                mapFileNameToRecordType("05_Antioquia/CNPV2018_5PER_A2_05.dta"),
            ).toBe("persons");
            expect(
                mapFileNameToRecordType("05_Antioquia\\CNPV2018_2HOG_A2_05.dta"),
            ).toBe("households");
        });

        it("should reject an unknown code", () => {
            expect(() =>
                mapFileNameToRecordType("CNPV2018_4XYZ_A2_05.dta"),
            ).toThrow(
                new UnknownRecordTypeError(
                    "4XYZ",
                    "CNPV2018_4XYZ_A2_05.dta",
                ),
            );
        });

        it("should reject a name without a second segment", () => {
            expect(() => mapFileNameToRecordType("readme.txt")).toThrow(
                UnknownRecordTypeError,
            );
        });
    });

    describe("mapRecordTypeToSchema", () => {
        it("should map the labeled record types to their dictionary records", () => {
            expect(mapRecordTypeToSchema("dwellings")).toBe("REGVIV");
            expect(mapRecordTypeToSchema("households")).toBe("REGHOG");
            expect(mapRecordTypeToSchema("deaths")).toBe("REGFALL");
            expect(mapRecordTypeToSchema("persons")).toBe("REGPER");
        });

        it("should reject georeference", () => {
            expect(() => mapRecordTypeToSchema("georeference")).toThrow(
                "Unknown record type 'georeference'",
            );
        });
    });

    describe("isLabeledRecordType", () => {
        it("should exclude only georeference", () => {
            expect(RECORD_TYPES.filter(isLabeledRecordType)).toEqual([
                "dwellings",
                "households",
                "deaths",
                "persons",
            ]);
        });
    });
});
