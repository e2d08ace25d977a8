/**
 * User Store - Structured Logger
 *
 * JSON-line logging to the console. Each line carries level, timestamp,
 * component and message, plus optional data. Lines below the configured
 * minimum level are dropped.
 *
 * Never pass password hashes, OAuth tokens or other user secrets in `data`.
 */

// =============================================================================
// Types
// =============================================================================

/** Log levels for structured logging */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    component: string;
    message: string;
    data?: Record<string, unknown>;
}

export interface LoggerOptions {
    /** Lowest level written (default: INFO) */
    minLevel?: LogLevel;
    /** Receives each serialized line (default: console.log) */
    sink?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARN: 30,
    ERROR: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// =============================================================================
// Logger
// =============================================================================

export class Logger {
    private readonly component: string;
    private readonly minLevel: LogLevel;
    private readonly sink: (line: string) => void;

    constructor(component: string, options: LoggerOptions = {}) {
        this.component = component;
        this.minLevel = options.minLevel ?? 'INFO';
        this.sink = options.sink ?? ((line) => console.log(line));
    }

    /**
     * Create a logger for a sub-component sharing level and sink.
     */
    child(component: string): Logger {
        return new Logger(`${this.component}.${component}`, {
            minLevel: this.minLevel,
            sink: this.sink,
        });
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }

        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            component: this.component,
            message,
            ...(data && { data }),
        };

        this.sink(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a Logger whose minimum level comes from LOG_LEVEL.
 *
 * @throws Error if LOG_LEVEL is set to something other than a LogLevel
 */
export function createLogger(component: string): Logger {
    const configured = process.env.LOG_LEVEL?.toUpperCase();

    if (configured === undefined || configured === '') {
        return new Logger(component);
    }

    if (!isLogLevel(configured)) {
        throw new Error(`Invalid LOG_LEVEL: ${process.env.LOG_LEVEL}`);
    }

    return new Logger(component, { minLevel: configured });
}
