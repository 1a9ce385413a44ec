/**
 * Stderr Logger
 *
 * Everything is written to stderr so that a process embedding the client can
 * keep stdout for its own output. Setting LOG_LEVEL=silent swaps in a no-op
 * logger; the choice is made on every call, so the variable can be changed
 * after module load.
 */

import winston from 'winston';
import _ from 'lodash';

export interface Logger {
    debug(infoObject: Record<string, unknown>, message?: string): Logger
    debug(message: string, ...meta: unknown[]): Logger
    info(infoObject: Record<string, unknown>, message?: string): Logger
    info(message: string, ...meta: unknown[]): Logger
    warn(infoObject: Record<string, unknown>, message?: string): Logger
    warn(message: string, ...meta: unknown[]): Logger
    error(infoObject: Record<string, unknown>, message?: string): Logger
    error(message: string, ...meta: unknown[]): Logger
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogArgs = [infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]];

interface LogSink {
    write(level: LogLevel, ...args: LogArgs): void
}

const silentSink: LogSink = {
    write: () => undefined,
};

/**
 * Adapts winston to the `(infoObject, message)` calling convention
 */
class StderrSink implements LogSink {
    private readonly winstonLogger: winston.Logger;

    constructor() {
        this.winstonLogger = winston.createLogger({
            level:  process.env.LOG_LEVEL ?? 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Stream({
                    stream: process.stderr,
                }),
            ],
        });
    }

    write(level: LogLevel, infoObjectOrMessage: Record<string, unknown> | string, ...rest: unknown[]): void {
        if(_.isString(infoObjectOrMessage)) {
            this.winstonLogger.log(level, infoObjectOrMessage, ...rest);
            return;
        }
        const [message] = rest;
        this.winstonLogger.log(level, _.isString(message) ? message : '', infoObjectOrMessage);
    }
}

let stderrSink: StderrSink | undefined;

function getSink(): LogSink {
    if(process.env.LOG_LEVEL === 'silent') {
        return silentSink;
    }

    // Created on first use so the winston level reflects LOG_LEVEL at that point
    stderrSink ??= new StderrSink();
    return stderrSink;
}

/**
 * Logger that picks its sink at call time
 */
function createLazyLogger(): Logger {
    const logger: Logger = {
        debug: (...args: LogArgs) => log('debug', args),
        info:  (...args: LogArgs) => log('info', args),
        warn:  (...args: LogArgs) => log('warn', args),
        error: (...args: LogArgs) => log('error', args),
    };

    function log(level: LogLevel, args: LogArgs): Logger {
        getSink().write(level, ...args);
        return logger;
    }

    return logger;
}

export const dynamicLogger: Logger = createLazyLogger();
