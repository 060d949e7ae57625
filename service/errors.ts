/**
 * Error taxonomy for the census loader.
 *
 * Every error here is fatal: the loader never retries and never returns a
 * partial result. The underlying failure, when there is one, is kept on
 * `cause`.
 */

/**
 * A file name segment or record type is not part of the fixed mapping tables.
 */
export class UnknownRecordTypeError extends Error {
    /** The segment or record type that failed to map */
    readonly identifier: string;
    /** The file the identifier was taken from, when there was one */
    readonly fileName?: string;

    /**
     * Creates a new UnknownRecordTypeError.
     *
     * @param identifier - The unmapped segment or record type.
     * @param fileName - The file the segment came from.
     */
    constructor(identifier: string, fileName?: string) {
        super(
            fileName === undefined
                ? `Unknown record type '${identifier}'`
                : `Unknown record type '${identifier}' in file name '${fileName}'`,
        );
        this.name = "UnknownRecordTypeError";
        this.identifier = identifier;
        this.fileName = fileName;
    }
}

/**
 * A territory archive, or an archive nested in it, cannot be opened or lacks
 * the expected structure.
 */
export class ArchiveFormatError extends Error {
    /** Path of the territory archive being processed */
    readonly archivePath: string;

    /**
     * Creates a new ArchiveFormatError.
     *
     * @param message - Human-readable error description.
     * @param archivePath - Path of the territory archive.
     * @param cause - The underlying failure.
     */
    constructor(message: string, archivePath: string, cause?: unknown) {
        super(message, { cause });
        this.name = "ArchiveFormatError";
        this.archivePath = archivePath;
    }
}

/**
 * The dictionary archive or its definition file is missing or malformed, or
 * the dictionary parser rejected the text.
 */
export class DictionaryFormatError extends Error {
    /** Path of the dictionary archive */
    readonly dictionaryPath: string;

    /**
     * Creates a new DictionaryFormatError.
     *
     * @param message - Human-readable error description.
     * @param dictionaryPath - Path of the dictionary archive.
     * @param cause - The underlying failure.
     */
    constructor(message: string, dictionaryPath: string, cause?: unknown) {
        super(message, { cause });
        this.name = "DictionaryFormatError";
        this.dictionaryPath = dictionaryPath;
    }
}

/**
 * The statistical-file decoder rejected a data file, or its output could not
 * be cleaned.
 */
export class DecodeError extends Error {
    /** Path of the territory archive holding the file */
    readonly archivePath: string;
    /** Name of the data file inside its inner archive */
    readonly fileName: string;

    /**
     * Creates a new DecodeError.
     *
     * @param archivePath - Path of the territory archive.
     * @param fileName - Name of the rejected data file.
     * @param cause - The underlying failure.
     */
    constructor(archivePath: string, fileName: string, cause?: unknown) {
        const reason = cause instanceof Error ? `: ${cause.message}` : "";
        super(
            `Cannot decode '${fileName}' in '${archivePath}'${reason}`,
            { cause },
        );
        this.name = "DecodeError";
        this.archivePath = archivePath;
        this.fileName = fileName;
    }
}

/**
 * A collaborator module cannot be loaded or does not export what is expected.
 */
export class PluginError extends Error {
    /** The module specifier that was loaded */
    readonly specifier: string;

    /**
     * Creates a new PluginError.
     *
     * @param message - Human-readable error description.
     * @param specifier - The module specifier.
     * @param cause - The underlying failure.
     */
    constructor(message: string, specifier: string, cause?: unknown) {
        super(message, { cause });
        this.name = "PluginError";
        this.specifier = specifier;
    }
}
