import {
    type Table,
    mapColumns,
    renameColumns,
    toNullableInteger,
} from "../../core";

/**
 * Cleans a freshly decoded table.
 *
 * Statistical files store nullable integer-coded categoricals as 64-bit
 * floats so that missing values fit; those columns are cast back to the
 * nullable integer type. Column names are then upper-cased to match the
 * dictionary's item names. Cleaning a clean table changes nothing.
 *
 * @param table - The decoded table.
 * @returns The cleaned table.
 * @throws {ColumnCastError} If a float column holds a fractional value.
 * @throws {TableError} If upper-casing makes two column names collide.
 */
export const cleanTable = (table: Table): Table => {
    // Restore integer semantics on float columns
    const cast = mapColumns(table, (column, name) =>
        column.type === "float64" ? toNullableInteger(column, name) : column,
    );

    // Column names as defined in the data dictionary
    return renameColumns(cast, (name) => name.toUpperCase());
};
