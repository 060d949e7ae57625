import AdmZip from "adm-zip";
import { DICTIONARY_DEFINITION_FILE } from "../conf";
import { VERBOSE } from "../config";
import { DictionaryFormatError } from "../errors";
import { logger } from "../logger";
import type {
    ColumnLabels,
    DictionaryParser,
    LabeledRecordType,
    ParsedDictionary,
    ValueLabels,
} from "../types";
import { mapRecordTypeToSchema } from "./recordTypes";

/**
 * Reads the data dictionary archive and parses its definition file.
 *
 * The definition file sits at a fixed name inside the archive and must be
 * valid UTF-8. Without a dictionary no labeling can happen, so every
 * failure here is fatal.
 *
 * @param dictionaryPath - Path of the dictionary archive.
 * @param parser - The external dictionary parser.
 * @param definitionFile - Name of the definition file inside the archive.
 * @returns The parsed dictionary.
 * @throws {DictionaryFormatError} If the archive or definition file is missing or unreadable, or the parser rejects the text.
 */
export const loadDictionary = (
    dictionaryPath: string,
    parser: DictionaryParser,
    definitionFile: string = DICTIONARY_DEFINITION_FILE,
): ParsedDictionary => {
    let archive: AdmZip;
    try {
        archive = new AdmZip(dictionaryPath);
    } catch (error_) {
        throw new DictionaryFormatError(
            `Cannot open dictionary archive '${dictionaryPath}'`,
            dictionaryPath,
            error_,
        );
    }

    const entry = archive.getEntry(definitionFile);
    if (entry === null) {
        throw new DictionaryFormatError(
            `Dictionary archive '${dictionaryPath}' has no '${definitionFile}'`,
            dictionaryPath,
        );
    }

    let text: string;
    try {
        text = new TextDecoder("utf-8", { fatal: true }).decode(entry.getData());
    } catch (error_) {
        throw new DictionaryFormatError(
            `Cannot read '${definitionFile}' in '${dictionaryPath}' as UTF-8`,
            dictionaryPath,
            error_,
        );
    }
    if (VERBOSE)
        logger(`read ${text.length} characters from '${definitionFile}'`);

    try {
        return parser(text);
    } catch (error_) {
        throw new DictionaryFormatError(
            `Cannot parse '${definitionFile}' in '${dictionaryPath}'`,
            dictionaryPath,
            error_,
        );
    }
};

/**
 * Gets the column labels of a record type.
 *
 * @param dictionary - The parsed dictionary.
 * @param recordType - A record type described by the dictionary.
 * @returns Column name → column label.
 */
export const getColumnLabels = (
    dictionary: ParsedDictionary,
    recordType: LabeledRecordType,
): ColumnLabels => dictionary.getColumnLabels(mapRecordTypeToSchema(recordType));

/**
 * Gets the value labels of a record type.
 *
 * @param dictionary - The parsed dictionary.
 * @param recordType - A record type described by the dictionary.
 * @returns Column name → (encoded value → label).
 */
export const getValueLabels = (
    dictionary: ParsedDictionary,
    recordType: LabeledRecordType,
): ValueLabels => dictionary.getValueLabels(mapRecordTypeToSchema(recordType));
