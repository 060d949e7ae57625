/**
 * A single cell. Missing values are always `null`, never NaN or a sentinel.
 */
export type CellValue = string | number | null;

/**
 * Element type of a column, as reported by the statistical-file decoder.
 *
 * `Int64` is the nullable integer type produced by cleaning; `object` holds
 * mixed values (e.g. a categorical column after partial label substitution).
 */
export type ColumnType =
    | "float64"
    | "float32"
    | "int8"
    | "int16"
    | "int32"
    | "Int64"
    | "string"
    | "object";

/**
 * All supported column types, used to validate decoder output.
 */
export const COLUMN_TYPES: readonly ColumnType[] = [
    "float64",
    "float32",
    "int8",
    "int16",
    "int32",
    "Int64",
    "string",
    "object",
];

/**
 * A typed column of values.
 */
export type Column = {
    /** Element type of the values */
    readonly type: ColumnType;
    /** One value per row */
    readonly values: readonly CellValue[];
};

/**
 * An immutable in-memory table. Column order is the map's insertion order.
 */
export type Table = {
    /** Columns keyed by name */
    readonly columns: ReadonlyMap<string, Column>;
    /** Number of rows (0 for a table without columns) */
    readonly rowCount: number;
};

/**
 * Plain-object form of a table's columns, as handed over by decoders.
 */
export type ColumnRecord = Readonly<Record<string, Column>>;

/**
 * Sparse substitution map: column name → (string form of a value → replacement).
 */
export type ValueReplacements = Readonly<
    Record<string, Readonly<Record<string, CellValue>>>
>;
