import { pino, type Logger as PinoLoggerBase, type LoggerOptions as PinoOptions } from 'pino';
import { errWithCause } from 'pino-std-serializers';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogMeta = Record<string, unknown>;

/** The logging surface the codec and CLI depend on. */
export interface Logger {
    trace(message: string, meta?: LogMeta): void;
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Pretty-print through pino-pretty (a worker-thread transport; meant for interactive use). */
    prettify?: boolean;
}

export class PinoLogger implements Logger {
    protected readonly logger: PinoLoggerBase;

    constructor(opts: LoggerOptions = {}, bindings: LogMeta = {}, base?: PinoLoggerBase) {
        this.logger = base ? base.child(bindings) : PinoLogger.create(opts).child(bindings);
    }

    private static create(opts: LoggerOptions): PinoLoggerBase {
        const pinoOpts: PinoOptions = {
            ...(opts.level && { level: opts.level }),
            serializers: { err: errWithCause },
            ...(opts.prettify && {
                transport: {
                    target: 'pino-pretty',
                    options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
                },
            }),
        };
        return pino(pinoOpts);
    }

    trace(message: string, meta: LogMeta = {}): void {
        this.logger.trace(meta, message);
    }

    debug(message: string, meta: LogMeta = {}): void {
        this.logger.debug(meta, message);
    }

    info(message: string, meta: LogMeta = {}): void {
        this.logger.info(meta, message);
    }

    warn(message: string, meta: LogMeta = {}): void {
        this.logger.warn(meta, message);
    }

    error(message: string, meta: LogMeta = {}): void {
        this.logger.error(meta, message);
    }

    child(bindings: LogMeta): Logger {
        return new PinoLogger({}, bindings, this.logger);
    }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
    return new PinoLogger(opts);
}

/** A logger that drops everything; the default when callers pass none. */
export const silentLogger: Logger = createLogger({ level: 'silent' });
