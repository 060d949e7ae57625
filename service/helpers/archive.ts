import AdmZip from "adm-zip";
import { INNER_ARCHIVE_SUFFIX } from "../conf";
import { VERBOSE } from "../config";
import { ArchiveFormatError, DecodeError } from "../errors";
import { logger } from "../logger";
import type { StatisticalFileDecoder, TerritoryTables } from "../types";
import { cleanTable } from "./clean";
import { mapFileNameToRecordType } from "./recordTypes";

/**
 * Opens a ZIP archive from a path or an in-memory buffer.
 *
 * @param source - Archive path or bytes.
 * @param archivePath - Territory archive path, for the error.
 * @param label - What is being opened, for the error.
 * @returns The opened archive.
 * @throws {ArchiveFormatError} If the archive cannot be read.
 */
const openArchive = (
    source: string | Buffer,
    archivePath: string,
    label: string,
): AdmZip => {
    try {
        return new AdmZip(source);
    } catch (error_) {
        throw new ArchiveFormatError(
            `Cannot open ${label} in '${archivePath}'`,
            archivePath,
            error_,
        );
    }
};

/**
 * Reads the bytes of an archive entry.
 *
 * @throws {ArchiveFormatError} If the entry cannot be inflated.
 */
const readEntry = (
    entry: AdmZip.IZipEntry,
    archivePath: string,
): Buffer => {
    try {
        return entry.getData();
    } catch (error_) {
        throw new ArchiveFormatError(
            `Cannot read entry '${entry.entryName}' in '${archivePath}'`,
            archivePath,
            error_,
        );
    }
};

/**
 * Decodes one territory archive into its record type tables.
 *
 * A territory archive holds one inner `*dta.zip` archive per record type,
 * each wrapping a single statistical data file. Inner archives are buffered
 * in memory one at a time; every data file in them is decoded, cleaned and
 * stored under the record type encoded in its name.
 *
 * @param archivePath - Path of the territory archive.
 * @param decoder - The statistical-file decoder.
 * @returns The decoded tables keyed by record type.
 * @throws {ArchiveFormatError} If an archive is unreadable or a record type appears twice.
 * @throws {UnknownRecordTypeError} If a data file name carries no known record type code.
 * @throws {DecodeError} If the decoder rejects a file or its output cannot be cleaned.
 */
export const decodeTerritoryArchive = (
    archivePath: string,
    decoder: StatisticalFileDecoder,
): TerritoryTables => {
    const tables: TerritoryTables = {};

    const outer = openArchive(archivePath, archivePath, "territory archive");

    // Only the nested statistical data archives are of interest
    const innerEntries = outer
        .getEntries()
        .filter(
            (entry) =>
                !entry.isDirectory &&
                entry.entryName.toLowerCase().endsWith(INNER_ARCHIVE_SUFFIX),
        );
    if (VERBOSE)
        logger(
            "inner archives",
            archivePath,
            innerEntries.map((entry) => entry.entryName),
        );

    for (const innerEntry of innerEntries) {
        const inner = openArchive(
            readEntry(innerEntry, archivePath),
            archivePath,
            `inner archive '${innerEntry.entryName}'`,
        );

        for (const dataEntry of inner.getEntries()) {
            if (dataEntry.isDirectory) continue;

            const fileName = dataEntry.entryName;
            const recordType = mapFileNameToRecordType(fileName);

            if (tables[recordType] !== undefined) {
                throw new ArchiveFormatError(
                    `Territory archive '${archivePath}' holds more than one ${recordType} file (found '${fileName}')`,
                    archivePath,
                );
            }

            const data = readEntry(dataEntry, archivePath);

            try {
                tables[recordType] = cleanTable(decoder(data, fileName));
            } catch (error_) {
                // Cleaning failures are reported against the file too
                if (error_ instanceof DecodeError) throw error_;
                throw new DecodeError(archivePath, fileName, error_);
            }

            if (VERBOSE)
                logger(
                    `decoded '${fileName}' as ${recordType} (${tables[recordType]?.rowCount ?? 0} rows)`,
                );
        }
    }

    return tables;
};
