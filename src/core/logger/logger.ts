/**
 * Logger
 *
 * Stream-based logger that subscribes to every observer event and writes
 * it as a text line or a JSON entry. Rendering code only emits events;
 * this is the one place they reach the console.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: { level: 'info', json: false, color: true },
 *     console: process.stderr,
 * })
 *
 * logger.start()
 * // Logger now captures all observer events
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, isLevelEnabled, shouldLog } from './classifier.js';
import { formatEntry, formatLine, generateMessage, serializeEntry } from './formatter.js';
import type { EntryLevel, LogEntry, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every JSON entry */
    context?: Record<string, unknown>;

    /** Stream to write to (defaults to stderr) */
    console?: Writable;
}

/**
 * Logger that captures observer events and writes to a stream.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #console: Writable;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#console = options.console ?? process.stderr;

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every JSON entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Clear the logging context.
     */
    clearContext(): void {

        this.#context = {};

    }

    /**
     * Start the logger.
     *
     * Subscribes to all observer events.
     */
    start(): void {

        if (this.#state !== 'idle') {

            return;

        }

        this.#state = 'running';

        if (!this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        observer.emit('logger:started', { level: this.#config.level });

    }

    /**
     * Stop the logger and remove its subscription.
     */
    stop(): void {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        if (this.#config.json) {

            const includeData = this.#config.level === 'verbose';

            this.#write(serializeEntry(formatEntry(event, data, this.#context, includeData)));

            return;

        }

        let message = `[${event}] ${generateMessage(event, data)}`;

        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            message += ` ${JSON.stringify(data)}`;

        }

        this.#write(formatLine(classifyEvent(event), message, new Date().toISOString(), this.#config.color));

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    /**
     * Internal log method.
     */
    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running' || !isLevelEnabled(level, this.#config.level)) {

            return;

        }

        const timestamp = new Date().toISOString();

        if (this.#config.json) {

            const entry: LogEntry = { timestamp, level, event: 'log', message };

            if (data && Object.keys(data).length > 0) {

                entry.data = data;

            }

            if (Object.keys(this.#context).length > 0) {

                entry.context = this.#context;

            }

            this.#write(serializeEntry(entry));

            return;

        }

        let line = message;

        if (this.#config.level === 'verbose' && data && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#write(formatLine(level, line, timestamp, this.#config.color));

    }

    #write(line: string): void {

        this.#console.write(line);

    }

}

/**
 * Narrow an event payload to a plain record.
 */
function toRecord(data: unknown): Record<string, unknown> {

    if (data !== null && typeof data === 'object' && !Array.isArray(data)) {

        return Object.fromEntries(Object.entries(data));

    }

    return data === undefined ? {} : { value: data };

}
