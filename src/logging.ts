/**
 * Logging for the realtime client.
 *
 * Component loggers write a timestamp, a level label and a short component
 * tag. Output is coloured when stdout is a TTY.
 */

// =============================================================================
// Logging Configuration
// =============================================================================

/** ANSI color codes for terminal output. */
export const LogColors = {
    RESET: '\x1b[0m',
    DIM: '\x1b[2m',

    RED: '\x1b[31m',
    GREEN: '\x1b[32m',
    YELLOW: '\x1b[33m',
    BLUE: '\x1b[34m',
    MAGENTA: '\x1b[35m',
    CYAN: '\x1b[36m',
    WHITE: '\x1b[37m',

    BRIGHT_BLACK: '\x1b[90m',
    BRIGHT_CYAN: '\x1b[96m',
    BRIGHT_WHITE: '\x1b[97m'
} as const;

/** Log levels. */
export enum LogLevel {
    TRACE = -1,
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/** Component colours. */
const COMPONENT_COLORS: Record<string, string> = {
    'rtclient': LogColors.BRIGHT_CYAN,
    'rtclient.auth': LogColors.GREEN,
    'rtclient.socket': LogColors.MAGENTA,
    'rtclient.router': LogColors.CYAN,
    'rtclient.deadlines': LogColors.BLUE
};

/** Level styles for logging. */
const LEVEL_STYLES: Record<LogLevel, { color: string; label: string }> = {
    [LogLevel.TRACE]: { color: LogColors.DIM, label: 'TRC' },
    [LogLevel.DEBUG]: { color: LogColors.BRIGHT_BLACK, label: 'DBG' },
    [LogLevel.INFO]: { color: LogColors.GREEN, label: 'INF' },
    [LogLevel.WARN]: { color: LogColors.YELLOW, label: 'WRN' },
    [LogLevel.ERROR]: { color: LogColors.RED, label: 'ERR' }
};

/**
 * Logger used throughout the client. A custom implementation can be handed
 * to the config builder to route output elsewhere.
 */
export interface Logger {
    trace(message: string): void;
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: Error): void;
}

/** Console method per level. */
const LEVEL_SINKS: Record<LogLevel, (line: string) => void> = {
    [LogLevel.TRACE]: (line) => console.debug(line),
    [LogLevel.DEBUG]: (line) => console.debug(line),
    [LogLevel.INFO]: (line) => console.log(line),
    [LogLevel.WARN]: (line) => console.warn(line),
    [LogLevel.ERROR]: (line) => console.error(line)
};

/** Current global log level. */
let currentLogLevel = LogLevel.INFO;

/**
 * Simple logger factory.
 */
export function createLogger(component: string): Logger {
    const color = COMPONENT_COLORS[component] ?? LogColors.WHITE;
    const tag = (component.replace('rtclient.', '').toUpperCase() || 'CLIENT').padEnd(9);

    const write = (level: LogLevel, message: string, error?: Error): void => {
        if (level < currentLogLevel) {
            return;
        }
        const timestamp = new Date().toISOString().slice(11, 23);
        const { color: levelColor, label } = LEVEL_STYLES[level];

        LEVEL_SINKS[level](
            process.stdout.isTTY
                ? `${LogColors.DIM}${timestamp}${LogColors.RESET} ${levelColor}${label}${LogColors.RESET} ` +
                  `${color}${tag}${LogColors.RESET} ${LogColors.BRIGHT_WHITE}${message}${LogColors.RESET}`
                : `${timestamp} ${label} ${tag} ${message}`
        );
        if (error?.stack) {
            console.error(error.stack);
        }
    };

    return {
        trace: (message) => write(LogLevel.TRACE, message),
        debug: (message) => write(LogLevel.DEBUG, message),
        info: (message) => write(LogLevel.INFO, message),
        warn: (message) => write(LogLevel.WARN, message),
        error: (message, error) => write(LogLevel.ERROR, message, error)
    };
}

/**
 * Wrap a logger so trace lines are only emitted when `enabled` is set.
 *
 * The client's `trace` flag decides whether wire-level detail is logged at
 * all; the global level still filters what reaches the console.
 */
export function traceGated(logger: Logger, enabled: boolean): Logger {
    if (enabled) {
        return logger;
    }
    return { ...logger, trace: () => undefined };
}

/**
 * Logger for a client component: the configured logger if one was given,
 * otherwise a component logger, with trace lines gated on `trace`.
 */
export function componentLogger(component: string, options: { logger?: Logger; trace: boolean }): Logger {
    return traceGated(options.logger ?? createLogger(component), options.trace);
}

/**
 * Set the global log level.
 */
export function setLogLevel(level: LogLevel): void {
    currentLogLevel = level;
}

/**
 * Get the global log level.
 */
export function getLogLevel(): LogLevel {
    return currentLogLevel;
}

/**
 * Parse log level from string.
 */
export function parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
        case 'TRACE': return LogLevel.TRACE;
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'WARNING': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        default: return LogLevel.INFO;
    }
}
