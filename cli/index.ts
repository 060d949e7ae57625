#!/usr/bin/env node
/**
 * CensoKit CLI
 *
 * Usage:
 *   censokit load      - Decode, label and export the census tables
 *   censokit version   - Display version information
 *
 * Options:
 *   -d, --daemon       Run without terminal output
 *   -v, --version      Display version information
 *   -h, --help         Display help information
 */

import { Command } from "commander";
import * as dotenv from "dotenv";
import { version } from "../core/version";
import {
    displayBanner,
    logError,
    setDaemonMode,
    theme,
} from "../service/helpers/terminalUI";
import type { LoadCommandOptions } from "./commands/load";

// Load environment variables before any configuration is read
dotenv.config();

/**
 * Main CLI application instance.
 */
const program = new Command();

program
    .name("censokit")
    .description(
        theme.muted(
            "Decodes nested census archives and labels them with the data dictionary",
        ),
    )
    .version(version, "-v, --version", "Display version information")
    .helpOption("-h, --help", "Display help information");

/**
 * Load Command - decodes every territory archive, applies the dictionary
 * labels and writes one CSV per record type.
 */
program
    .command("load")
    .description("Decode, label and export the census tables")
    .option("--data <dir>", "Folder holding the territory archives")
    .option("--dictionary <path>", "Path of the data dictionary archive")
    .option("--out <dir>", "Folder to write the CSV files to")
    .option("--decoder <module>", "Module exporting the statistical-file decoder")
    .option("--parser <module>", "Module exporting the dictionary parser")
    .option("--column-labels", "Also write the column labels of each table", false)
    .option("-d, --daemon", "Run in background (daemon) mode", false)
    .action(async (options: LoadCommandOptions) => {
        setDaemonMode(options.daemon);

        if (!options.daemon) {
            displayBanner(version);
        }

        try {
            // Imported lazily so the configuration sees the loaded environment
            const { runLoadCommand } = await import("./commands/load");
            await runLoadCommand(options);
        } catch {
            // The command has already reported the failure in detail
            logError("Failed to execute load command");
            process.exit(1);
        }
    });

/**
 * Version Command - Displays detailed version information.
 */
program
    .command("version")
    .description("Display detailed version and environment information")
    .action(() => {
        displayBanner(version);
        console.log(`${theme.muted("Node.js:")}      ${process.version}`);
        console.log(`${theme.muted("Platform:")}     ${process.platform}`);
        console.log(`${theme.muted("Architecture:")} ${process.arch}`);
    });

// Show banner and help if no command provided
if (process.argv.length === 2) {
    displayBanner(version);
    program.outputHelp();
    process.exit(0);
}

program.parseAsync(process.argv).catch((error: unknown) => {
    logError("Unexpected failure", error);
    process.exit(1);
});
