import debug from "debug";

/**
 * Loggers for the loader.
 */
export const logger = debug("censokit");
export const error = debug("error");
