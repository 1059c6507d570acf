/**
 * @module
 * Build logging.
 */
import winston = require('winston');

export type Level = 'error' | 'info' | 'debug';

const levels: Record<Level, number> = {
    error: 0,
    info: 1,
    debug: 2,
};

export interface Logger {
    /** Message for the user, always shown. */
    print(message: string): void;
    info(message: string, ...rest: unknown[]): void;
    debug(message: string, ...rest: unknown[]): void;
    error(message: string, err: unknown, ...rest: unknown[]): void;
}

class NopLogger implements Logger {
    print(_message: string): void {
        // noop
    }

    info(_message: string, ..._rest: unknown[]): void {
        // noop
    }

    debug(_message: string, ..._rest: unknown[]): void {
        // noop
    }

    error(_message: string, _err: unknown, ..._rest: unknown[]): void {
        // noop
    }
}

export function createNopLogger(): Logger {
    return new NopLogger();
}

class ConsoleLogger implements Logger {
    private readonly logger: winston.Logger;

    constructor(level: Level, stream: NodeJS.WritableStream) {
        this.logger = winston.createLogger({
            format: winston.format.combine(
                winston.format.errors({ stack: true }),
                winston.format.printf(info => joinTokens(
                    info.level === 'info' || info.print === true ? undefined : `[${info.level}]`,
                    String(info.message),
                    typeof info.stack === 'string' ? info.stack : undefined,
                )),
            ),
            level,
            levels,
            transports: [
                new winston.transports.Stream({ stream }),
            ],
        });
    }

    print(message: string): void {
        // never filtered by level
        this.logger.log('error', message, { print: true });
    }

    info(message: string, ...rest: unknown[]): void {
        this.logger.info(message, ...rest);
    }

    debug(message: string, ...rest: unknown[]): void {
        this.logger.debug(message, ...rest);
    }

    error(message: string, err: unknown, ...rest: unknown[]): void {
        this.logger.error(message, err, ...rest);
    }
}

/**
 * Creates a logger writing to `stream` (default: stderr).
 */
export function createConsoleLogger(level: Level = 'info', stream: NodeJS.WritableStream = process.stderr): Logger {
    return new ConsoleLogger(level, stream);
}

function joinTokens(...tokens: (string | undefined)[]): string {
    return tokens
        .map(t => t && t.trim())
        .filter(Boolean)
        .join(' ');
}
