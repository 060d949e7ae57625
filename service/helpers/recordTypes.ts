import * as path from "node:path";
import { UnknownRecordTypeError } from "../errors";
import type {
    FileCode,
    LabeledRecordType,
    RecordType,
    SchemaIdentifier,
} from "../types";

/**
 * File name code → record type.
 */
const FILE_CODE_TO_RECORD_TYPE: Readonly<Record<FileCode, RecordType>> = {
    "1VIV": "dwellings",
    "2HOG": "households",
    "3FALL": "deaths",
    "5PER": "persons",
    MGN: "georeference",
};

/**
 * Checks whether a file name segment is one of the known record type codes.
 */
const isFileCode = (segment: string): segment is FileCode =>
    Object.hasOwn(FILE_CODE_TO_RECORD_TYPE, segment);

/**
 * Checks whether a record type is described by the data dictionary.
 */
export const isLabeledRecordType = (
    recordType: RecordType,
): recordType is LabeledRecordType => recordType !== "georeference";

/**
 * Maps a data file name to its record type.
 *
 * The code is the second `_`-separated segment of the file's base name,
 * e.g. `CNPV2018_5PER_A2_05.dta` → `persons`.
 *
 * @param fileName - Data file name, optionally with a directory prefix.
 * @returns The record type.
 * @throws {UnknownRecordTypeError} If the segment is missing or not a known code.
 */
export const mapFileNameToRecordType = (fileName: string): RecordType => {
    // Archives built on Windows may use backslashes as separators
    const baseName = path.posix.basename(fileName.replace(/\\/g, "/"));
    const segment = baseName.split("_")[1];

    if (segment === undefined || !isFileCode(segment)) {
        throw new UnknownRecordTypeError(segment ?? "", fileName);
    }

    return FILE_CODE_TO_RECORD_TYPE[segment];
};

/**
 * Maps a record type to the dictionary's record name.
 *
 * @param recordType - The record type.
 * @returns The schema identifier.
 * @throws {UnknownRecordTypeError} For `georeference`, which the dictionary does not describe.
 */
export const mapRecordTypeToSchema = (
    recordType: RecordType,
): SchemaIdentifier => {
    switch (recordType) {
        case "dwellings":
            return "REGVIV";
        case "households":
            return "REGHOG";
        case "deaths":
            return "REGFALL";
        case "persons":
            return "REGPER";
        case "georeference":
            throw new UnknownRecordTypeError(recordType);
        default: {
            const unreachable: never = recordType;
            throw new UnknownRecordTypeError(String(unreachable));
        }
    }
};
