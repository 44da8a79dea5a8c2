/**
 * Logger utility for claimcite
 *
 * Provides console output functions that can be silenced for machine-readable
 * output (json). Machine-readable output writes ONLY the structured result to
 * stdout with no other logs.
 */

const PREFIX = '[claimcite]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), warn() and debug() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Enable debug lines. Debug output goes to stderr so it never mixes with results.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Progress details, only with --verbose.
 */
export function debug(message: string): void {
    if (verboseMode && !silentMode) {
        console.error(`${PREFIX} ${message}`);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(message: string): void {
    if (!silentMode) {
        console.warn(`${PREFIX} Warning: ${message}`);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
