import type { CellValue, Table } from "../../core";
import type { SchemaIdentifier } from "./census-types";

/**
 * Column name → human-readable column label.
 */
export type ColumnLabels = Readonly<Record<string, string>>;

/**
 * Column name → (encoded value → label). Encoded values are keyed by their
 * string form.
 */
export type ValueLabels = Readonly<
    Record<string, Readonly<Record<string, CellValue>>>
>;

/**
 * A data dictionary parsed by the external dictionary parser.
 */
export interface ParsedDictionary {
    /** Column labels of a dictionary record */
    getColumnLabels(schemaId: SchemaIdentifier): ColumnLabels;
    /** Value labels of a dictionary record */
    getValueLabels(schemaId: SchemaIdentifier): ValueLabels;
}

/**
 * Turns the dictionary definition text into a queryable dictionary.
 */
export type DictionaryParser = (text: string) => ParsedDictionary;

/**
 * Turns the bytes of a statistical data file into a typed table.
 */
export type StatisticalFileDecoder = (data: Buffer, fileName: string) => Table;

/**
 * The external collaborators the pipeline depends on.
 */
export type Collaborators = {
    /** Statistical-file decoder */
    decoder: StatisticalFileDecoder;
    /** Dictionary parser */
    parser: DictionaryParser;
};
