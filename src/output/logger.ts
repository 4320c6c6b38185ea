/**
 * Logger utility for pagelingo
 *
 * Console output that can be silenced when the CLI prints machine-readable
 * JSON, so that stdout carries only the structured response.
 */

const PREFIX = '[pagelingo]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, warn() and debug() output nothing.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Enable debug lines (per-attempt provider traces, chunk plans).
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Debug trace to stderr, only in verbose mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(PREFIX, ...args);
    }
}
