import * as path from "node:path";
import AdmZip from "adm-zip";
import type { ColumnRecord } from "../../../core";
import { fsp } from "../fs";
import { toDecoder, toParser } from "../plugins";
import * as jsonDecoderModule from "./json-decoder";
import * as jsonParserModule from "./json-parser";

/** Decoder reading JSON column records. */
export const jsonDecoder = toDecoder(jsonDecoderModule, "json-decoder");

/** Parser reading the JSON dictionary format of `json-parser`. */
export const jsonParser = toParser(jsonParserModule, "json-parser");

/** Record type codes as they appear in data file names. */
export const FILE_CODES = ["1VIV", "2HOG", "3FALL", "5PER", "MGN"] as const;

/**
 * Builds a territory archive: one inner `_DTA.zip` per data file, each
 * holding that file with its columns as JSON. Raw buffers are stored as is.
 */
export const buildTerritoryArchive = (
    dataFiles: Record<string, ColumnRecord | Buffer>,
    extraEntries: Record<string, Buffer> = {},
): Buffer => {
    const outer = new AdmZip();

    for (const [fileName, content] of Object.entries(dataFiles)) {
        const inner = new AdmZip();
        inner.addFile(
            fileName,
            Buffer.isBuffer(content)
                ? content
                : Buffer.from(JSON.stringify(content), "utf-8"),
        );
        outer.addFile(
            `${path.posix.parse(fileName).name}_DTA.zip`,
            inner.toBuffer(),
        );
    }

    for (const [entryName, content] of Object.entries(extraEntries)) {
        outer.addFile(entryName, content);
    }

    return outer.toBuffer();
};

/**
 * Data files for all five record types of a territory, each with a single
 * `id` column holding `ids`.
 */
export const territoryFiles = (
    territory: string,
    ids: number[],
): Record<string, ColumnRecord> => {
    const files: Record<string, ColumnRecord> = {};
    for (const code of FILE_CODES) {
        files[`CNPV2018_${code}_A2_${territory}.dta`] = {
            id: { type: "float64", values: ids },
        };
    }
    return files;
};

/**
 * Builds a dictionary archive holding `document` as JSON under `entryName`.
 */
export const buildDictionaryArchive = (
    document: unknown,
    entryName = "Diccionario_datosCNPV.dcf",
): Buffer => {
    const archive = new AdmZip();
    archive.addFile(entryName, Buffer.from(JSON.stringify(document), "utf-8"));
    return archive.toBuffer();
};

/**
 * Writes `content` to `filePath`, creating parent folders.
 */
export const writeFixture = async (
    filePath: string,
    content: Buffer | string,
): Promise<string> => {
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(filePath, content);
    return filePath;
};
