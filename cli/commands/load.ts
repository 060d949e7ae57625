/**
 * Load Command Implementation
 *
 * Runs the census load with spinners per stage and a row count summary.
 */

import debug from "debug";
import service from "../../service";
import {
    DATA_DIR,
    DECODER_MODULE,
    DICTIONARY_PATH,
    OUTPUT_DIR,
    PARSER_MODULE,
} from "../../service/config";
import {
    createProgressBar,
    displayBox,
    displayKeyValue,
    displaySection,
    failSpinner,
    formatDuration,
    formatNumber,
    getDaemonMode,
    logError,
    logInfo,
    logSuccess,
    logWarning,
    startSpinner,
    succeedSpinner,
    theme,
    updateSpinner,
} from "../../service/helpers/terminalUI";
import { error } from "../../service/logger";
import { RECORD_TYPES } from "../../service/types";

/**
 * Command options for the load command.
 */
export interface LoadCommandOptions {
    /** Run in daemon (background) mode */
    daemon: boolean;
    /** Folder holding the territory archives */
    data?: string;
    /** Path of the data dictionary archive */
    dictionary?: string;
    /** Folder to write the CSV files to */
    out?: string;
    /** Module exporting the statistical-file decoder */
    decoder?: string;
    /** Module exporting the dictionary parser */
    parser?: string;
    /** Also write the column labels of each table */
    columnLabels: boolean;
}

/**
 * Executes the load command.
 *
 * 1. Loads the decoder and dictionary parser
 * 2. Decodes every territory archive, one spinner update per territory
 * 3. Labels the tables with the data dictionary
 * 4. Writes the CSV files and prints a summary
 *
 * @param options - Command options from the CLI.
 * @throws Error if any step of the load fails.
 */
export async function runLoadCommand(
    options: LoadCommandOptions,
): Promise<void> {
    const startTime = Date.now();
    const isDaemon = getDaemonMode();

    // Enable debug loggers if not in daemon mode
    if (!isDaemon && process.env.DEBUG === undefined) {
        debug.enable("censokit,error");
    }

    const settings = {
        dataDir: options.data ?? DATA_DIR,
        dictionaryPath: options.dictionary ?? DICTIONARY_PATH,
        outputDir: options.out ?? OUTPUT_DIR,
        decoderModule: options.decoder ?? DECODER_MODULE,
        parserModule: options.parser ?? PARSER_MODULE,
        columnLabels: options.columnLabels,
    };

    displaySection("Configuration");
    displayKeyValue({
        "Data Folder": settings.dataDir,
        Dictionary: settings.dictionaryPath,
        "Output Folder": settings.outputDir,
        Decoder: settings.decoderModule ?? "(not set)",
        Parser: settings.parserModule ?? "(not set)",
        "Column Labels": settings.columnLabels ? "Yes" : "No",
    });

    displaySection("Processing");
    startSpinner("Searching for territory archives...");
    let territories = 0;

    try {
        const { tables, files } = await service.load({
            ...settings,
            onTerritoryStart: ({ archivePath, index, total }) => {
                updateSpinner(
                    `Decoding territories  ${createProgressBar(index - 1, total, 20)}  ${theme.muted(archivePath)}`,
                );
            },
            onTerritory: ({ index, total }) => {
                territories = index;
                if (index === total) {
                    succeedSpinner(
                        `Decoded ${formatNumber(total)} territory archive(s)`,
                    );
                    startSpinner("Applying dictionary labels...");
                }
            },
            onAggregated: () => {
                if (territories === 0) {
                    succeedSpinner("No territory archives found");
                    logWarning(
                        `No territory archives under '${settings.dataDir}'; writing empty tables`,
                    );
                    startSpinner("Applying dictionary labels...");
                }
            },
        });
        succeedSpinner(`Wrote ${files.length} file(s) to ${settings.outputDir}`);
        for (const file of files) {
            logInfo(theme.muted(file));
        }

        const duration = Date.now() - startTime;
        displaySection("Summary");
        displayKeyValue(
            Object.fromEntries(
                RECORD_TYPES.map((recordType) => [
                    recordType,
                    `${formatNumber(tables[recordType].rowCount)} rows`,
                ]),
            ),
        );
        displayKeyValue({ Duration: formatDuration(duration) });

        if (!isDaemon) {
            console.log();
            displayBox(
                `Census load completed in ${formatDuration(duration)}`,
                "success",
            );
            console.log();
        }

        logSuccess(`Census load completed in ${formatDuration(duration)}`);
    } catch (err) {
        failSpinner("Census load failed");
        logError("Load error", err);
        error("error loading census data", err);

        displayBox("Census load failed. Check logs for details.", "error");

        throw err;
    }
}
