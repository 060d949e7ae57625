import { createProcessedTables, exportTables } from "./commands/process";
import {
    DATA_DIR,
    DECODER_MODULE,
    DICTIONARY_PATH,
    OUTPUT_DIR,
    PARSER_MODULE,
    VERBOSE,
} from "./config";
import { type AggregateFolderOptions, loadCollaborators } from "./helpers";
import { logger } from "./logger";
import type { CensusTables } from "./types";

/**
 * Options for a full load. Anything omitted falls back to the configuration.
 */
export interface LoadOptions extends AggregateFolderOptions {
    /** Root folder holding the territory archives */
    dataDir?: string;
    /** Path of the data dictionary archive */
    dictionaryPath?: string;
    /** Folder the CSV files are written to */
    outputDir?: string;
    /** Module specifier of the statistical-file decoder */
    decoderModule?: string;
    /** Module specifier of the dictionary parser */
    parserModule?: string;
    /** Also write the column labels of each labeled record type */
    columnLabels?: boolean;
    /** Called once the folder has been aggregated, before labeling */
    onAggregated?: (tables: CensusTables) => void;
}

/**
 * Outcome of a full load.
 */
export interface LoadResult {
    /** One labeled table per record type */
    tables: CensusTables;
    /** Files written, in record type order */
    files: string[];
}

/**
 * Loads the census release end to end: collaborators, territory archives,
 * dictionary, labels, then CSV output.
 *
 * @param options - Paths and callbacks overriding the configuration.
 * @returns The labeled tables and the files written.
 */
const load = async (options: LoadOptions = {}): Promise<LoadResult> => {
    const {
        dataDir = DATA_DIR,
        dictionaryPath = DICTIONARY_PATH,
        outputDir = OUTPUT_DIR,
        decoderModule = DECODER_MODULE,
        parserModule = PARSER_MODULE,
        columnLabels = false,
        ...callbacks
    } = options;
    if (VERBOSE)
        logger("load", { dataDir, dictionaryPath, outputDir, columnLabels });

    const collaborators = await loadCollaborators({
        decoderModule,
        parserModule,
    });

    const { tables, dictionary } = await createProcessedTables({
        dataDir,
        dictionaryPath,
        collaborators,
        ...callbacks,
    });

    const files = await exportTables(tables, outputDir, {
        columnLabels,
        dictionary,
    });

    return { tables, files };
};

export default {
    load,
};

export { createProcessedTables, exportTables, load };
