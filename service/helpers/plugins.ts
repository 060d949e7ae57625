import * as path from "node:path";
import {
    COLUMN_TYPES,
    type CellValue,
    type Column,
    type ColumnRecord,
    type ColumnType,
    createTable,
} from "../../core";
import { VERBOSE } from "../config";
import { PluginError } from "../errors";
import { logger } from "../logger";
import type {
    ColumnLabels,
    Collaborators,
    DictionaryParser,
    StatisticalFileDecoder,
    ValueLabels,
} from "../types";

/**
 * Shape of a decoder module: `decode(data, fileName)` returns the columns of
 * the decoded file keyed by name.
 */
type DecoderModule = {
    decode: (data: Buffer, fileName: string) => unknown;
};

/**
 * Shape of a parser module: `parse(text)` returns an object answering
 * column-label and value-label queries per dictionary record.
 */
type ParserModule = {
    parse: (text: string) => unknown;
};

/**
 * What a parser module's `parse` must return.
 */
type DictionaryLike = {
    getColumnLabels: (schemaId: string) => unknown;
    getValueLabels: (schemaId: string) => unknown;
};

/**
 * Where to load the collaborators from.
 */
export type CollaboratorModules = {
    /** Module specifier of the statistical-file decoder */
    decoderModule?: string;
    /** Module specifier of the dictionary parser */
    parserModule?: string;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const isCellValue = (value: unknown): value is CellValue =>
    value === null || typeof value === "string" || typeof value === "number";

const isColumnType = (value: unknown): value is ColumnType =>
    COLUMN_TYPES.some((type) => type === value);

const isColumn = (value: unknown): value is Column =>
    isObject(value) &&
    isColumnType(value.type) &&
    Array.isArray(value.values) &&
    value.values.every(isCellValue);

const isColumnRecord = (value: unknown): value is ColumnRecord =>
    isObject(value) && Object.values(value).every(isColumn);

const isColumnLabels = (value: unknown): value is ColumnLabels =>
    isObject(value) &&
    Object.values(value).every((label) => typeof label === "string");

const isValueLabels = (value: unknown): value is ValueLabels =>
    isObject(value) &&
    Object.values(value).every(
        (labels) => isObject(labels) && Object.values(labels).every(isCellValue),
    );

const isDecoderModule = (value: unknown): value is DecoderModule =>
    isObject(value) && typeof value.decode === "function";

const isParserModule = (value: unknown): value is ParserModule =>
    isObject(value) && typeof value.parse === "function";

const isDictionaryLike = (value: unknown): value is DictionaryLike =>
    isObject(value) &&
    typeof value.getColumnLabels === "function" &&
    typeof value.getValueLabels === "function";

/**
 * Imports a module by specifier. Paths are resolved against the working
 * directory; anything else is treated as a package name.
 *
 * @throws {PluginError} If the module cannot be imported.
 */
const importModule = async (specifier: string): Promise<unknown> => {
    const resolved =
        specifier.startsWith(".") || path.isAbsolute(specifier)
            ? path.resolve(specifier)
            : specifier;
    if (VERBOSE) logger("importing collaborator", resolved);

    try {
        const imported: unknown = await import(resolved);
        // CommonJS modules surface their exports under `default`
        if (isObject(imported) && isObject(imported.default)) {
            return { ...imported.default, ...imported };
        }
        return imported;
    } catch (error_) {
        throw new PluginError(
            `Cannot import module '${specifier}'`,
            specifier,
            error_,
        );
    }
};

/**
 * Wraps a decoder module so that its output is validated and turned into a table.
 */
export const toDecoder = (
    source: DecoderModule,
    specifier: string,
): StatisticalFileDecoder => {
    return (data, fileName) => {
        const output = source.decode(data, fileName);
        if (!isColumnRecord(output)) {
            throw new PluginError(
                `Decoder '${specifier}' did not return columns for '${fileName}'`,
                specifier,
            );
        }
        return createTable(output);
    };
};

/**
 * Wraps a parser module so that the dictionary it returns, and every answer
 * the dictionary gives, is validated.
 */
export const toParser = (
    source: ParserModule,
    specifier: string,
): DictionaryParser => {
    return (text) => {
        const parsed = source.parse(text);
        if (!isDictionaryLike(parsed)) {
            throw new PluginError(
                `Parser '${specifier}' did not return a dictionary`,
                specifier,
            );
        }

        return {
            getColumnLabels: (schemaId) => {
                const labels = parsed.getColumnLabels(schemaId);
                if (!isColumnLabels(labels)) {
                    throw new PluginError(
                        `Parser '${specifier}' returned malformed column labels for '${schemaId}'`,
                        specifier,
                    );
                }
                return labels;
            },
            getValueLabels: (schemaId) => {
                const labels = parsed.getValueLabels(schemaId);
                if (!isValueLabels(labels)) {
                    throw new PluginError(
                        `Parser '${specifier}' returned malformed value labels for '${schemaId}'`,
                        specifier,
                    );
                }
                return labels;
            },
        };
    };
};

/**
 * Loads the statistical-file decoder and the dictionary parser from their modules.
 *
 * @param modules - Module specifiers of both collaborators.
 * @returns The validated collaborators.
 * @throws {PluginError} If a specifier is missing, a module cannot be imported, or it lacks the expected export.
 */
export const loadCollaborators = async ({
    decoderModule,
    parserModule,
}: CollaboratorModules): Promise<Collaborators> => {
    if (decoderModule === undefined || decoderModule === "") {
        throw new PluginError(
            "No decoder module configured (set CENSOKIT_DECODER_MODULE or pass --decoder)",
            "",
        );
    }
    if (parserModule === undefined || parserModule === "") {
        throw new PluginError(
            "No dictionary parser module configured (set CENSOKIT_PARSER_MODULE or pass --parser)",
            "",
        );
    }

    const decoder = await importModule(decoderModule);
    if (!isDecoderModule(decoder)) {
        throw new PluginError(
            `Module '${decoderModule}' does not export a 'decode' function`,
            decoderModule,
        );
    }

    const parser = await importModule(parserModule);
    if (!isParserModule(parser)) {
        throw new PluginError(
            `Module '${parserModule}' does not export a 'parse' function`,
            parserModule,
        );
    }

    return {
        decoder: toDecoder(decoder, decoderModule),
        parser: toParser(parser, parserModule),
    };
};
