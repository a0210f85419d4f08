/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for framework logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Configuration-facing level names, lowest verbosity last. */
export type LogLevelName = `debug` | `info` | `warn` | `error`;

const SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Debug]: 10,
    [LogLevel.Info]: 20,
    [LogLevel.Warning]: 30,
    [LogLevel.Error]: 40,
    [LogLevel.Critical]: 50,
};

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

let _minimumLevel: LogLevel = LogLevel.Info; // messages below this are dropped

/**
 * Sets the minimum level that reaches the console.
 * @param level LogLevel | LogLevelName - New threshold
 * @example
 * SetLogLevel('debug');
 */
export function SetLogLevel(level: LogLevel | LogLevelName): void {
    _minimumLevel = IsLevelName(level) ? LEVEL_BY_NAME[level] : level;
}

function IsLevelName(level: LogLevel | LogLevelName): level is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, level);
}

/** Current minimum level. */
export function GetLogLevel(): LogLevel {
    return _minimumLevel;
}

/**
 * Logs a message at the specified log level, prepending a timestamp and source.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (module or class)
 * @param context string - Optional additional context
 * @example
 * log(LogLevel.Info, 'Index created', 'ContextRegistry');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (SEVERITY[level] < SEVERITY[_minimumLevel]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${level}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /** Logs an error level message. */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /** Logs a warning level message. */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
