/**
 * Centralized configuration module for the CensoKit loader.
 *
 * This module parses all environment variables once at startup. Every value
 * has a default so the loader runs against the conventional folder layout
 * (`data/` for territory archives, `dict/` for the dictionary archive)
 * without any configuration. CLI flags take precedence over these values.
 *
 * @module config
 */

// ---------------------------------------------------------------------------------
// Input Configuration
// ---------------------------------------------------------------------------------

/**
 * Root folder searched recursively for territory archives.
 *
 * @default "data"
 * @env CENSOKIT_DATA_DIR
 */
export const DATA_DIR = process.env.CENSOKIT_DATA_DIR ?? "data";

/**
 * Path to the archive holding the data dictionary definition file.
 *
 * @default "dict/Diccionario_Datos_CNPV_2018.zip"
 * @env CENSOKIT_DICTIONARY_PATH
 */
export const DICTIONARY_PATH =
    process.env.CENSOKIT_DICTIONARY_PATH ??
    "dict/Diccionario_Datos_CNPV_2018.zip";

// ---------------------------------------------------------------------------------
// Collaborator Configuration
// ---------------------------------------------------------------------------------

/**
 * Module exporting the statistical-file decoder (`decode`).
 * Resolved relative to the working directory unless it is a package name.
 *
 * @env CENSOKIT_DECODER_MODULE
 */
export const DECODER_MODULE = process.env.CENSOKIT_DECODER_MODULE;

/**
 * Module exporting the dictionary parser (`parse`).
 *
 * @env CENSOKIT_PARSER_MODULE
 */
export const PARSER_MODULE = process.env.CENSOKIT_PARSER_MODULE;

// ---------------------------------------------------------------------------------
// Output Configuration
// ---------------------------------------------------------------------------------

/**
 * Folder the labeled tables are written to.
 *
 * @default "target/censokit"
 * @env CENSOKIT_OUTPUT_DIR
 */
export const OUTPUT_DIR = process.env.CENSOKIT_OUTPUT_DIR ?? "target/censokit";

/**
 * Whether to enable verbose logging.
 *
 * @default false
 * @env VERBOSE
 */
export const VERBOSE = process.env.VERBOSE === "true";
