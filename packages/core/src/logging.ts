/**
 * Simple Logger with component-based namespacing and global log level filtering.
 *
 * Designed for lean observability:
 * - No transports (just console.error)
 * - No formatters (simple structured format)
 * - No log rotation (LSP clients capture stderr)
 * - Global level filtering only (no per-component filtering)
 */

/**
 * Log levels - numeric for comparison.
 * Lower levels are more severe.
 */
export enum LogLevel {
    OFF = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
    TRACE = 5,
}

/**
 * Level names accepted from configuration.
 */
export type LogLevelName = 'off' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    off: LogLevel.OFF,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
};

export function isLogLevelName(name: string): name is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, name);
}

/**
 * Map a configured level name to a LogLevel, falling back to WARN.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
    if (name !== undefined && isLogLevelName(name)) {
        return LEVELS_BY_NAME[name];
    }
    return LogLevel.WARN;
}

/**
 * Logger class with component-based namespacing.
 *
 * All output goes to console.error (stderr); stdout carries the LSP stream.
 *
 * @example
 * ```ts
 * const log = new Logger('AnalyzerBridge');
 * Logger.setLevel(LogLevel.DEBUG);
 * log.debug('Connecting to analyzer subprocess', { timeout: 5000 });
 * ```
 */
export class Logger {
    /**
     * Global log level - only logs at or below this level are output.
     * Default: WARN (production-safe)
     */
    static globalLevel: LogLevel = LogLevel.WARN;

    static setLevel(level: LogLevel): void {
        Logger.globalLevel = level;
    }

    private readonly component: string;

    /**
     * @param component - Component name for namespacing (e.g., 'AnalyzerBridge', 'Dispatcher')
     */
    constructor(component: string) {
        this.component = component;
    }

    private log(level: LogLevel, levelName: string, message: string, context?: object): void {
        if (level > Logger.globalLevel) {
            return;
        }

        const timestamp = new Date().toISOString();
        const contextStr = context ? ` ${JSON.stringify(context)}` : '';
        console.error(`[${timestamp}][${levelName}][${this.component}] ${message}${contextStr}`);
    }

    /** Log an ERROR message - something went wrong */
    error(msg: string, ctx?: object): void {
        this.log(LogLevel.ERROR, 'ERROR', msg, ctx);
    }

    /** Log a WARN message - something unexpected but not fatal */
    warn(msg: string, ctx?: object): void {
        this.log(LogLevel.WARN, 'WARN', msg, ctx);
    }

    /** Log an INFO message - normal but significant event */
    info(msg: string, ctx?: object): void {
        this.log(LogLevel.INFO, 'INFO', msg, ctx);
    }

    /** Log a DEBUG message - diagnostic information for troubleshooting */
    debug(msg: string, ctx?: object): void {
        this.log(LogLevel.DEBUG, 'DEBUG', msg, ctx);
    }

    /** Log a TRACE message - very detailed flow tracing */
    trace(msg: string, ctx?: object): void {
        this.log(LogLevel.TRACE, 'TRACE', msg, ctx);
    }
}
