/**
 * Terminal UI Helper Module
 *
 * Terminal output for the CLI: ora spinners and chalk styling, all of it
 * silenced in daemon mode.
 */

import chalk from "chalk";
import ora from "ora";

// ---------------------------------------------------------------------------------
// Theme Configuration
// ---------------------------------------------------------------------------------

/**
 * Color palette for consistent terminal styling across the application.
 */
export const theme = {
    /** Primary brand color - used for main headings */
    primary: chalk.hex("#B45309"),
    /** Secondary accent color - used for highlights and progress bars */
    secondary: chalk.hex("#0891B2"),
    /** Success color - used for completed operations */
    success: chalk.hex("#10B981"),
    /** Warning color - used for non-critical alerts */
    warning: chalk.hex("#F59E0B"),
    /** Error color - used for failures */
    error: chalk.hex("#EF4444"),
    /** Muted color - used for less important information */
    muted: chalk.hex("#6B7280"),
    /** Info color - used for general information */
    info: chalk.hex("#3B82F6"),
    /** Highlight color - used for key values */
    highlight: chalk.hex("#DB2777"),
    /** Dim text */
    dim: chalk.dim,
    /** Bold text */
    bold: chalk.bold,
} as const;

// ---------------------------------------------------------------------------------
// Branding
// ---------------------------------------------------------------------------------

const LOGO = `
${theme.primary("   ___                      _  ___ _   ")}
${theme.primary("  / __|___ _ _  ___ ___ ___| |/ (_) |_ ")}
${theme.secondary(" | (__/ -_) ' \\(_-</ _ \\___| ' <| |  _|")}
${theme.secondary("  \\___\\___|_||_/__/\\___/   |_|\\_\\_|\\__|")}
`;

/**
 * Displays the logo and version information.
 *
 * @param version - The current version string to display.
 */
export function displayBanner(version?: string): void {
    if (isDaemonMode) return;
    console.log(LOGO);
    console.log(
        theme.muted("  ─────────────────────────────────────────────────────"),
    );
    console.log(`  ${theme.bold("Census microdata loader")}`);
    if (version) {
        console.log(`  ${theme.muted(`Version ${version}`)}`);
    }
    console.log(
        theme.muted(
            "  ─────────────────────────────────────────────────────\n",
        ),
    );
}

// ---------------------------------------------------------------------------------
// Spinner Management
// ---------------------------------------------------------------------------------

/** Current active spinner instance for sequential operations */
let currentSpinner: ora.Ora | null = null;

/** Flag indicating whether we're in daemon/silent mode */
let isDaemonMode = false;

/**
 * Sets the daemon mode flag. When enabled, all terminal output is suppressed.
 *
 * @param enabled - Whether daemon mode should be enabled.
 */
export function setDaemonMode(enabled: boolean): void {
    isDaemonMode = enabled;
}

/**
 * Checks if the application is running in daemon mode.
 */
export function getDaemonMode(): boolean {
    return isDaemonMode;
}

const spinnerFrames = ["◐", "◓", "◑", "◒"];

/**
 * Starts a new spinner with the given message, stopping any running one.
 * Does nothing in daemon mode.
 *
 * @param text - The message to display alongside the spinner.
 */
export function startSpinner(text: string): void {
    if (isDaemonMode) return;

    if (currentSpinner?.isSpinning) {
        currentSpinner.stop();
    }

    currentSpinner = ora({
        text: theme.info(text),
        spinner: {
            interval: 80,
            frames: spinnerFrames,
        },
        color: "cyan",
    }).start();
}

/**
 * Updates the current spinner's text.
 */
export function updateSpinner(text: string): void {
    if (isDaemonMode || !currentSpinner) return;
    currentSpinner.text = theme.info(text);
}

/**
 * Marks the current spinner as successful.
 *
 * @param text - Optional success message. Uses spinner text if not provided.
 */
export function succeedSpinner(text?: string): void {
    if (isDaemonMode || !currentSpinner) return;
    currentSpinner.succeed(theme.success(text || currentSpinner.text));
    currentSpinner = null;
}

/**
 * Marks the current spinner as failed.
 *
 * @param text - Optional error message. Uses spinner text if not provided.
 */
export function failSpinner(text?: string): void {
    if (isDaemonMode || !currentSpinner) return;
    currentSpinner.fail(theme.error(text || currentSpinner.text));
    currentSpinner = null;
}

// ---------------------------------------------------------------------------------
// Logging Functions
// ---------------------------------------------------------------------------------

/**
 * Logs a success message with a checkmark icon.
 */
export function logSuccess(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.success("✔")} ${message}`);
}

/**
 * Logs an error message with an X icon, followed by the cause chain.
 *
 * @param message - The message to log.
 * @param error - Optional error whose stack is printed.
 */
export function logError(message: string, error?: unknown): void {
    if (isDaemonMode) return;
    console.error(`${theme.error("✖")} ${theme.error(message)}`);

    let current: unknown = error;
    while (current instanceof Error) {
        console.error(theme.dim(current.stack ?? current.message));
        current = current.cause;
    }
}

/**
 * Logs a warning message with a warning icon.
 */
export function logWarning(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.warning("⚠")} ${theme.warning(message)}`);
}

/**
 * Logs an info message with an info icon.
 */
export function logInfo(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.info("ℹ")} ${message}`);
}

// ---------------------------------------------------------------------------------
// Progress Indicators
// ---------------------------------------------------------------------------------

/**
 * Creates a visual progress bar string.
 *
 * @param current - Current progress value.
 * @param total - Total value for 100% completion.
 * @param width - Width of the progress bar in characters.
 * @returns Formatted progress bar string.
 */
export function createProgressBar(
    current: number,
    total: number,
    width = 30,
): string {
    const ratio = total > 0 ? current / total : 0;
    const percentage = Math.min(100, Math.max(0, ratio * 100));
    const filled = Math.round((percentage / 100) * width);
    const empty = width - filled;

    const filledBar = theme.secondary("█".repeat(filled));
    const emptyBar = theme.dim("░".repeat(empty));
    const percentText = theme.bold(`${percentage.toFixed(1)}%`);

    return `${filledBar}${emptyBar} ${percentText}`;
}

/**
 * Formats a number with thousands separators for readability.
 */
export function formatNumber(num: number): string {
    return num.toLocaleString("en-US");
}

/**
 * Formats a duration in milliseconds to a human-readable string.
 *
 * @param ms - Duration in milliseconds.
 * @returns Human-readable duration (e.g., "2h 15m 30s").
 */
export function formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) {
        return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
    }
    if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
}

// ---------------------------------------------------------------------------------
// Sections & Tables
// ---------------------------------------------------------------------------------

/**
 * Displays a styled section header.
 */
export function displaySection(title: string): void {
    if (isDaemonMode) return;
    console.log();
    console.log(`${theme.primary("▸")} ${theme.bold(title)}`);
    console.log(theme.muted(`  ${"─".repeat(title.length + 2)}`));
}

/**
 * Displays key-value pairs in a formatted table style.
 *
 * @param data - Object containing key-value pairs to display.
 * @param indent - Number of spaces to indent the table.
 */
export function displayKeyValue(
    data: Record<string, string | number | boolean>,
    indent = 2,
): void {
    if (isDaemonMode) return;

    const padding = " ".repeat(indent);
    const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

    for (const [key, value] of Object.entries(data)) {
        const paddedKey = key.padEnd(maxKeyLength);
        console.log(
            `${padding}${theme.muted(paddedKey)}  ${theme.highlight(String(value))}`,
        );
    }
}

/**
 * Displays a boxed message for important announcements.
 *
 * @param message - The message to display in the box.
 * @param type - The type of message (affects color).
 */
export function displayBox(
    message: string,
    type: "info" | "success" | "warning" | "error" = "info",
): void {
    if (isDaemonMode) return;

    const colorMap = {
        info: theme.info,
        success: theme.success,
        warning: theme.warning,
        error: theme.error,
    };

    const color = colorMap[type];
    const border = color("─".repeat(message.length + 4));
    const side = color("│");

    console.log(`${color("┌")}${border}${color("┐")}`);
    console.log(`${side}  ${message}  ${side}`);
    console.log(`${color("└")}${border}${color("┘")}`);
}
