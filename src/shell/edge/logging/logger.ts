import log from 'electron-log/node';
import type { LogLevel } from '@/pure/settings/types';

export type Logger = ReturnType<typeof log.scope>;

export interface LoggingOptions {
    readonly logLevel: LogLevel;
    readonly debug: boolean;
    readonly logFile: string | null;
}

const CONSOLE_FORMAT: string = '{y}-{m}-{d} {h}:{i}:{s} - {level}{scope} - {text}';

// Console only until configureLogging names a file
log.transports.file.level = false;
log.transports.console.format = CONSOLE_FORMAT;

/**
 * Apply log level and destination. `debug` wins over `logLevel`.
 */
export function configureLogging(options: LoggingOptions): void {
    const level: LogLevel = options.debug ? 'debug' : options.logLevel;
    log.transports.console.level = level;

    const logFile: string | null = options.logFile;
    if (logFile === null) {
        log.transports.file.level = false;
        return;
    }
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.format = CONSOLE_FORMAT;
    log.transports.file.level = level;
}

/** Scoped logger, e.g. createLogger('Server') prefixes lines with (Server). */
export function createLogger(scope: string): Logger {
    return log.scope(scope);
}
