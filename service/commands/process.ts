import * as path from "node:path";
import { columnNames, toRecords } from "../../core";
import { VERBOSE } from "../config";
import {
    type AggregateFolderOptions,
    aggregateFolder,
    applyLabels,
    getColumnLabels,
    isLabeledRecordType,
    loadDictionary,
    writeCsv,
} from "../helpers";
import { logger } from "../logger";
import {
    type CensusTables,
    type Collaborators,
    type ParsedDictionary,
    RECORD_TYPES,
} from "../types";

/**
 * Options for producing the labeled census tables.
 */
export interface ProcessOptions extends AggregateFolderOptions {
    /** Root folder holding the territory archives */
    dataDir: string;
    /** Path of the data dictionary archive */
    dictionaryPath: string;
    /** The external decoder and dictionary parser */
    collaborators: Collaborators;
    /** Called once the folder has been aggregated, before labeling */
    onAggregated?: (tables: CensusTables) => void;
}

/**
 * Result of processing: the labeled tables and the dictionary used.
 */
export interface ProcessResult {
    /** One labeled table per record type */
    tables: CensusTables;
    /** The parsed dictionary, for column label lookups */
    dictionary: ParsedDictionary;
}

/**
 * Produces the cleaned, labeled census tables.
 *
 * 1. Reads every territory archive in the data folder and stacks the tables
 *    of each record type
 * 2. Loads the data dictionary
 * 3. Replaces encoded categorical values with their labels
 *
 * @param options - Input paths, collaborators and progress callbacks.
 * @returns The labeled tables and the dictionary.
 * @throws {ArchiveFormatError | UnknownRecordTypeError | DecodeError | DictionaryFormatError} On any input problem; no partial result is returned.
 */
export const createProcessedTables = async ({
    dataDir,
    dictionaryPath,
    collaborators,
    onAggregated,
    ...aggregateOptions
}: ProcessOptions): Promise<ProcessResult> => {
    const aggregated = await aggregateFolder(
        dataDir,
        collaborators.decoder,
        aggregateOptions,
    );
    if (VERBOSE)
        logger(
            "aggregated",
            Object.fromEntries(
                RECORD_TYPES.map((recordType) => [
                    recordType,
                    aggregated[recordType].rowCount,
                ]),
            ),
        );
    onAggregated?.(aggregated);

    const dictionary = loadDictionary(dictionaryPath, collaborators.parser);

    return { tables: applyLabels(aggregated, dictionary), dictionary };
};

/**
 * Options for writing the tables to disk.
 */
export interface ExportOptions {
    /** Also write each labeled record type's column labels */
    columnLabels?: boolean;
    /** Dictionary to take the column labels from (required with `columnLabels`) */
    dictionary?: ParsedDictionary;
}

/**
 * Writes one CSV file per record type, named after the record type.
 *
 * With `columnLabels`, a `<recordType>_columns.csv` listing each column of
 * the table with its dictionary label is written next to every table but
 * the georeference frame.
 *
 * @param tables - The tables to write.
 * @param outputDir - Destination folder, created if missing.
 * @param options - Column label output.
 * @returns The paths written, in record type order.
 */
export const exportTables = async (
    tables: CensusTables,
    outputDir: string,
    { columnLabels = false, dictionary }: ExportOptions = {},
): Promise<string[]> => {
    const written: string[] = [];

    for (const recordType of RECORD_TYPES) {
        const table = tables[recordType];
        const file = path.join(outputDir, `${recordType}.csv`);
        await writeCsv(file, columnNames(table), toRecords(table));
        written.push(file);

        if (columnLabels && dictionary && isLabeledRecordType(recordType)) {
            const labels = getColumnLabels(dictionary, recordType);
            const labelsFile = path.join(
                outputDir,
                `${recordType}_columns.csv`,
            );
            await writeCsv(
                labelsFile,
                ["COLUMN", "LABEL"],
                columnNames(table).map((column) => ({
                    COLUMN: column,
                    LABEL: Object.hasOwn(labels, column) ? labels[column] : "",
                })),
            );
            written.push(labelsFile);
        }
    }

    return written;
};
