/**
 * Logging
 *
 * Server logs go to the client's output channel through the connection
 * console. Nothing is written to disk.
 */

import type { Connection } from 'vscode-languageserver/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'log';

export interface Logger {
    log(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    log: 3
};

export function shouldLog(configured: LogLevel, level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[configured];
}

export function createConnectionLogger(
    connection: Pick<Connection, 'console'>,
    level: LogLevel = 'info',
    prefix = '[tally]'
): Logger {
    return {
        log: (m: string) => { if (shouldLog(level, 'log')) connection.console.log(`${prefix} ${m}`); },
        info: (m: string) => { if (shouldLog(level, 'info')) connection.console.info(`${prefix} ${m}`); },
        warn: (m: string) => { if (shouldLog(level, 'warn')) connection.console.warn(`${prefix} ${m}`); },
        error: (m: string) => { if (shouldLog(level, 'error')) connection.console.error(`${prefix} ${m}`); }
    };
}

export const silentLogger: Logger = {
    log: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined
};
