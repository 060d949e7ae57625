/**
 * Suffix (compared case-insensitively) of the inner archives inside a
 * territory archive. Each one wraps a single statistical data file.
 */
export const INNER_ARCHIVE_SUFFIX = "dta.zip";

/**
 * Glob matching territory archives: a two-digit territory code, an
 * underscore, then anything (e.g. `05_ANTIOQUIA_CSV.zip`).
 */
export const TERRITORY_ARCHIVE_GLOB = "**/[0-9][0-9]_*";

/**
 * Name of the definition file inside the dictionary archive.
 */
export const DICTIONARY_DEFINITION_FILE = "Diccionario_datosCNPV.dcf";
