import type { Table } from "../../core";

/**
 * The census record types, in output order.
 */
export const RECORD_TYPES = [
    "dwellings",
    "households",
    "deaths",
    "persons",
    "georeference",
] as const;

/**
 * One of the five census entity categories the loader produces a table for.
 */
export type RecordType = (typeof RECORD_TYPES)[number];

/**
 * Record types described by the data dictionary (all but the georeference frame).
 */
export type LabeledRecordType = Exclude<RecordType, "georeference">;

/**
 * The dictionary's internal record name for a labeled record type.
 */
export type SchemaIdentifier = "REGVIV" | "REGHOG" | "REGFALL" | "REGPER";

/**
 * Record type code embedded in data file names (second `_`-separated segment).
 */
export type FileCode = "1VIV" | "2HOG" | "3FALL" | "5PER" | "MGN";

/**
 * One table per record type.
 */
export type CensusTables = Readonly<Record<RecordType, Table>>;

/**
 * Tables decoded from a single territory archive. A well-formed territory
 * carries all five; the aggregator checks that.
 */
export type TerritoryTables = Partial<Record<RecordType, Table>>;
