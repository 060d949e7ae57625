import * as path from "node:path";
import { glob } from "glob";
import {
    type Table,
    columnNames,
    concatTables,
    haveSameColumns,
} from "../../core";
import { TERRITORY_ARCHIVE_GLOB } from "../conf";
import { VERBOSE } from "../config";
import { ArchiveFormatError } from "../errors";
import { error, logger } from "../logger";
import {
    type CensusTables,
    RECORD_TYPES,
    type RecordType,
    type StatisticalFileDecoder,
} from "../types";
import { decodeTerritoryArchive } from "./archive";
import { pathExists } from "./fs";

/**
 * Progress information reported after each territory archive.
 */
export interface TerritoryProgress {
    /** Path of the territory archive just decoded */
    archivePath: string;
    /** 1-based position of the archive */
    index: number;
    /** Number of territory archives found */
    total: number;
}

/**
 * Options for aggregating a data folder.
 */
export interface AggregateFolderOptions {
    /** Called before each territory archive is decoded */
    onTerritoryStart?: (progress: TerritoryProgress) => void;
    /** Called after each territory archive is decoded */
    onTerritory?: (progress: TerritoryProgress) => void;
}

/**
 * Finds the territory archives below a folder.
 *
 * @param folderPath - Root folder, searched recursively.
 * @returns Absolute archive paths in lexical order; empty if the folder does not exist.
 */
export const findTerritoryArchives = async (
    folderPath: string,
): Promise<string[]> => {
    if (!(await pathExists(folderPath))) {
        error(`Data folder '${folderPath}' does not exist`);
        return [];
    }

    const matches = await glob(TERRITORY_ARCHIVE_GLOB, {
        cwd: folderPath,
        nodir: true,
    });

    return matches.sort().map((match) => path.resolve(folderPath, match));
};

/**
 * Reads every territory archive below a folder and stacks the tables of each
 * record type into one.
 *
 * Each territory must provide all five record types. Territories whose
 * columns differ from earlier ones are stacked on the union of columns, with
 * missing cells left null.
 *
 * @param folderPath - Root folder holding the territory archives.
 * @param decoder - The statistical-file decoder.
 * @param options - Progress callbacks.
 * @returns One table per record type; all empty when no archive is found.
 * @throws {ArchiveFormatError} If a territory lacks a record type or cannot be read.
 * @throws {UnknownRecordTypeError} If a data file name carries no known record type code.
 * @throws {DecodeError} If a data file cannot be decoded.
 */
export const aggregateFolder = async (
    folderPath: string,
    decoder: StatisticalFileDecoder,
    options: AggregateFolderOptions = {},
): Promise<CensusTables> => {
    const archives = await findTerritoryArchives(folderPath);
    if (VERBOSE) logger("territory archives", archives);

    // One growable list of territory tables per record type
    const parts: Record<RecordType, Table[]> = {
        dwellings: [],
        households: [],
        deaths: [],
        persons: [],
        georeference: [],
    };

    for (const [position, archivePath] of archives.entries()) {
        const progress = {
            archivePath,
            index: position + 1,
            total: archives.length,
        };
        options.onTerritoryStart?.(progress);

        const decoded = decodeTerritoryArchive(archivePath, decoder);

        for (const recordType of RECORD_TYPES) {
            const table = decoded[recordType];
            if (table === undefined) {
                throw new ArchiveFormatError(
                    `Territory archive '${archivePath}' has no ${recordType} data`,
                    archivePath,
                );
            }

            const first = parts[recordType][0];
            if (first !== undefined && !haveSameColumns(first, table)) {
                error(
                    `Columns of ${recordType} in '${archivePath}' differ from earlier territories; stacking on the union`,
                    { expected: columnNames(first), found: columnNames(table) },
                );
            }

            parts[recordType].push(table);
        }

        options.onTerritory?.(progress);
    }

    return {
        dwellings: concatTables(parts.dwellings),
        households: concatTables(parts.households),
        deaths: concatTables(parts.deaths),
        persons: concatTables(parts.persons),
        georeference: concatTables(parts.georeference),
    };
};
