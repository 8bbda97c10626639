/**
 * Logger Module
 *
 * Captures observer events and streams them to the console.
 *
 * Features:
 * - Event classification by name pattern
 * - Text lines (optionally colored) or JSON entries
 * - Direct info/warn/error/debug methods
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog, isLevelEnabled } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry, formatLine } from './formatter.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
