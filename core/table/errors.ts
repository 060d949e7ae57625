/**
 * Raised when a table cannot be built or reshaped as requested.
 */
export class TableError extends Error {
    /**
     * Creates a new TableError.
     *
     * @param message - Human-readable error description.
     */
    constructor(message: string) {
        super(message);
        this.name = "TableError";
    }
}

/**
 * Raised when a column holds a value its target type cannot represent.
 */
export class ColumnCastError extends TableError {
    /** Name of the column being cast */
    readonly column: string;
    /** The offending value */
    readonly value: unknown;

    /**
     * Creates a new ColumnCastError.
     *
     * @param column - Name of the column being cast.
     * @param value - The value that could not be cast.
     * @param targetType - The type the column was being cast to.
     */
    constructor(column: string, value: unknown, targetType: string) {
        super(
            `Cannot cast value '${String(value)}' in column '${column}' to ${targetType}`,
        );
        this.name = "ColumnCastError";
        this.column = column;
        this.value = value;
    }
}
