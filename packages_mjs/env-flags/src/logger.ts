/**
 * env-flags Logger
 * Provides standardized logging with multiple levels.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface EnvFlagsLogger {
    error(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'info';

// Detect initial log level from env
if (typeof process !== 'undefined' && process.env.ENV_FLAGS_LOG_LEVEL) {
    const envLevel = process.env.ENV_FLAGS_LOG_LEVEL.toLowerCase();
    if (isLogLevel(envLevel)) {
        currentLevel = envLevel;
    }
}

const PREFIX = process.env.ENV_FLAGS_LOG_PREFIX || '[env-flags]';

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

class ConsoleLogger implements EnvFlagsLogger {
    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
    }

    private format(message: string): string {
        return `${PREFIX} ${message}`;
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(this.format(message), ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.debug(this.format(message), ...args);
        }
    }

    trace(message: string, ...args: unknown[]): void {
        if (this.shouldLog('trace')) {
            console.log(this.format(message), ...args);
        }
    }
}

const loggerInstance = new ConsoleLogger();

export function getLogger(): EnvFlagsLogger {
    return loggerInstance;
}
