import { ColumnCastError, TableError } from "./errors";
import type {
    CellValue,
    Column,
    ColumnRecord,
    ColumnType,
    Table,
    ValueReplacements,
} from "./types";

/** Column types whose values are numbers. */
const NUMERIC_TYPES: ReadonlySet<ColumnType> = new Set<ColumnType>([
    "float64",
    "float32",
    "int8",
    "int16",
    "int32",
    "Int64",
]);

/**
 * Builds a table from an ordered list of named columns.
 *
 * @param entries - `[name, column]` pairs in the desired column order.
 * @returns The new table.
 * @throws {TableError} If a name repeats or the columns differ in length.
 */
export const tableFromEntries = (
    entries: Iterable<readonly [string, Column]>,
): Table => {
    const columns = new Map<string, Column>();
    let rowCount: number | undefined;

    for (const [name, column] of entries) {
        if (columns.has(name)) {
            throw new TableError(`Duplicate column '${name}'`);
        }

        // Every column must match the length of the first one
        if (rowCount === undefined) {
            rowCount = column.values.length;
        } else if (column.values.length !== rowCount) {
            throw new TableError(
                `Column '${name}' has ${column.values.length} rows, expected ${rowCount}`,
            );
        }

        columns.set(name, column);
    }

    return { columns, rowCount: rowCount ?? 0 };
};

/**
 * Builds a table from a plain object of columns.
 *
 * @param record - Columns keyed by name.
 * @returns The new table.
 * @throws {TableError} If the columns differ in length.
 */
export const createTable = (record: ColumnRecord): Table =>
    tableFromEntries(Object.entries(record));

/**
 * Returns a table with no columns and no rows.
 */
export const emptyTable = (): Table => ({ columns: new Map(), rowCount: 0 });

/**
 * Looks up a column by name.
 */
export const getColumn = (table: Table, name: string): Column | undefined =>
    table.columns.get(name);

/**
 * Lists the column names in order.
 */
export const columnNames = (table: Table): string[] => [
    ...table.columns.keys(),
];

/**
 * Checks whether two tables carry the same column names in the same order.
 */
export const haveSameColumns = (a: Table, b: Table): boolean => {
    const left = columnNames(a);
    const right = columnNames(b);
    return (
        left.length === right.length &&
        left.every((name, index) => name === right[index])
    );
};

/**
 * Returns a new table whose columns are the result of `fn` applied to each column.
 *
 * @param table - The source table.
 * @param fn - Receives each column and its name; returns the replacement column.
 * @returns The transformed table.
 */
export const mapColumns = (
    table: Table,
    fn: (column: Column, name: string) => Column,
): Table =>
    tableFromEntries(
        [...table.columns].map(
            ([name, column]) => [name, fn(column, name)] as const,
        ),
    );

/**
 * Returns a new table with every column renamed through `rename`.
 *
 * @throws {TableError} If two columns end up with the same name.
 */
export const renameColumns = (
    table: Table,
    rename: (name: string) => string,
): Table =>
    tableFromEntries(
        [...table.columns].map(
            ([name, column]) => [rename(name), column] as const,
        ),
    );

/**
 * Casts a column to the nullable integer type `Int64`.
 *
 * Nulls and NaNs become `null`; integral numbers are kept as they are.
 *
 * @param column - The column to cast.
 * @param name - Column name, used in the error.
 * @returns The cast column.
 * @throws {ColumnCastError} On a fractional, infinite or non-numeric value.
 */
export const toNullableInteger = (column: Column, name: string): Column => {
    const values: CellValue[] = [];

    for (const value of column.values) {
        if (
            value === null ||
            (typeof value === "number" && Number.isNaN(value))
        ) {
            values.push(null);
        } else if (typeof value === "number" && Number.isInteger(value)) {
            values.push(value);
        } else {
            throw new ColumnCastError(name, value, "Int64");
        }
    }

    return { type: "Int64", values };
};

/**
 * Works out the type of a column after some of its values were substituted.
 */
const typeAfterSubstitution = (
    original: ColumnType,
    values: readonly CellValue[],
): ColumnType => {
    const present = values.filter((value) => value !== null);

    if (present.every((value) => typeof value === "number")) {
        return NUMERIC_TYPES.has(original) ? original : "object";
    }
    if (present.every((value) => typeof value === "string")) {
        return "string";
    }
    return "object";
};

/**
 * Substitutes values column by column.
 *
 * A cell matches when its string form is a key of the column's replacement
 * map. Nulls never match, unmatched values pass through, and columns the
 * table does not have are ignored. Columns without a substitution keep
 * their identity.
 *
 * @param table - The source table.
 * @param replacements - Column name → (encoded value → replacement).
 * @returns The table with values substituted.
 */
export const replaceValues = (
    table: Table,
    replacements: ValueReplacements,
): Table =>
    mapColumns(table, (column, name) => {
        if (!Object.hasOwn(replacements, name)) return column;
        const lookup = replacements[name];

        const values: CellValue[] = [];
        let replaced = 0;

        for (const value of column.values) {
            const key = value === null ? undefined : String(value);
            if (key !== undefined && Object.hasOwn(lookup, key)) {
                values.push(lookup[key]);
                replaced += 1;
            } else {
                values.push(value);
            }
        }

        if (replaced === 0) return column;
        return { type: typeAfterSubstitution(column.type, values), values };
    });

/**
 * Stacks tables vertically.
 *
 * Columns are the union of all inputs in first-seen order; rows from a table
 * lacking a column get `null` there. A column keeps its type when every
 * table that has it agrees, otherwise it becomes `object`. Tables without
 * columns contribute nothing.
 *
 * @param tables - The tables to stack, top to bottom.
 * @returns The concatenated table.
 */
export const concatTables = (tables: readonly Table[]): Table => {
    const parts = tables.filter((table) => table.columns.size > 0);
    if (parts.length === 0) return emptyTable();
    if (parts.length === 1) return parts[0];

    // Collect the column union and reconcile types
    const types = new Map<string, ColumnType>();
    for (const part of parts) {
        for (const [name, column] of part.columns) {
            const seen = types.get(name);
            if (seen === undefined) {
                types.set(name, column.type);
            } else if (seen !== column.type) {
                types.set(name, "object");
            }
        }
    }

    const columns = new Map<string, Column>();
    for (const [name, type] of types) {
        const values: CellValue[] = [];
        for (const part of parts) {
            const column = part.columns.get(name);
            for (let row = 0; row < part.rowCount; row++) {
                values.push(column === undefined ? null : column.values[row]);
            }
        }
        columns.set(name, { type, values });
    }

    const rowCount = parts.reduce((total, part) => total + part.rowCount, 0);
    return { columns, rowCount };
};

/**
 * Converts a table to one plain object per row.
 */
export const toRecords = (table: Table): Array<Record<string, CellValue>> => {
    const records: Array<Record<string, CellValue>> = [];

    for (let row = 0; row < table.rowCount; row++) {
        const record: Record<string, CellValue> = {};
        for (const [name, column] of table.columns) {
            record[name] = column.values[row];
        }
        records.push(record);
    }

    return records;
};
