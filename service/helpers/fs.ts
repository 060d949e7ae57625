import * as fs from "node:fs";
import * as path from "node:path";
import * as Papa from "papaparse";
import { VERBOSE } from "../config";
import { logger } from "../logger";

/**
 * Make the file system promises available to the helpers.
 */
export const fsp = fs.promises;

/**
 * Checks if the given file or directory exists.
 *
 * @param filePath - The path to check.
 * @returns {Promise<boolean>} - A promise that resolves with true if the path exists, false otherwise.
 */
export const pathExists = async (filePath: string): Promise<boolean> => {
    try {
        // Try to access the path
        await fsp.access(filePath, fs.constants.F_OK);
        return true;
    } catch {
        return false;
    }
};

/**
 * Writes rows to a CSV file, creating the parent directory if needed.
 *
 * @param filePath - Destination path.
 * @param fields - Header row; also fixes the column order.
 * @param rows - One object per row, keyed by field.
 * @returns {Promise<void>} - A promise that resolves once the file is written.
 */
export const writeCsv = async (
    filePath: string,
    fields: string[],
    rows: Array<Record<string, unknown>>,
): Promise<void> => {
    // Create the destination directory
    await fsp.mkdir(path.dirname(filePath), { recursive: true });

    // An empty table still gets its header row
    const csv =
        rows.length === 0
            ? Papa.unparse([fields], { newline: "\n" })
            : Papa.unparse({ fields, data: rows }, { newline: "\n" });

    await fsp.writeFile(filePath, csv.length > 0 ? `${csv}\n` : csv, "utf-8");
    if (VERBOSE) logger(`wrote ${rows.length} rows to '${filePath}'`);
};
