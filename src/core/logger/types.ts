/**
 * Logger Types
 *
 * Type definitions for the weft logging system.
 * The logger captures observer events and streams them
 * to the console with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single log line.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels.
 * Lower numbers = more severe.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single JSON log entry.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "render:complete",
 *     "message": "Rendered page.html (12 directives, 3 iterations, 4ms)"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name, or 'log' for direct messages */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context set on the logger */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Minimum level to capture */
    level: LogLevel;

    /** Write JSON entries instead of text lines */
    json: boolean;

    /** Colorize level labels in text lines */
    color: boolean;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    json: false,
    color: false,
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
