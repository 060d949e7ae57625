import { replaceValues } from "../../core";
import { VERBOSE } from "../config";
import { logger } from "../logger";
import type {
    CensusTables,
    LabeledRecordType,
    ParsedDictionary,
} from "../types";
import { getValueLabels } from "./dictionary";

/**
 * Replaces encoded categorical values with their dictionary labels.
 *
 * Value labels are fetched afresh for each record type. Substitution is
 * sparse: columns and values without a label pass through unchanged. The
 * georeference frame is not described by the dictionary and is returned
 * as is.
 *
 * @param tables - One table per record type.
 * @param dictionary - The parsed dictionary.
 * @returns A new mapping with the same five record types.
 */
export const applyLabels = (
    tables: CensusTables,
    dictionary: ParsedDictionary,
): CensusTables => {
    const label = (recordType: LabeledRecordType) => {
        const valueLabels = getValueLabels(dictionary, recordType);
        if (VERBOSE)
            logger(
                `labeling ${recordType} with ${Object.keys(valueLabels).length} labeled columns`,
            );
        return replaceValues(tables[recordType], valueLabels);
    };

    return {
        dwellings: label("dwellings"),
        households: label("households"),
        deaths: label("deaths"),
        persons: label("persons"),
        georeference: tables.georeference,
    };
};
