import pino, { Logger, LoggerOptions } from 'pino';
import { ConfigService, Environment } from '../../config/environment';

export interface LogContext {
    component?: string;
    baseCurrency?: string;
    [key: string]: unknown;
}

export type LogMeta = Record<string, unknown>;

class LoggerService {
    private static instance: LoggerService | undefined;
    private readonly logger: Logger;

    private constructor(logger: Logger) {
        this.logger = logger;
    }

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = LoggerService.create(ConfigService.getInstance().getAll());
        }
        return LoggerService.instance;
    }

    /** Builds a logger from an already validated environment. */
    static create(environment: Environment): LoggerService {
        return new LoggerService(LoggerService.createLogger(environment));
    }

    private static createLogger(environment: Environment): Logger {
        const env = environment.NODE_ENV;
        const isDevelopment = env === 'development';
        const defaultLevel = env === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';

        const baseOptions: LoggerOptions = {
            level: environment.LOG_LEVEL ?? defaultLevel,
            base: { service: 'finance-helper', environment: env },
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        };

        if (isDevelopment) {
            return pino({
                ...baseOptions,
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'HH:MM:ss Z',
                        ignore: 'pid,hostname'
                    }
                }
            });
        }

        return pino({
            ...baseOptions,
            serializers: {
                error: pino.stdSerializers.err
            }
        });
    }

    get level(): string {
        return this.logger.level;
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(meta ?? {}, message);
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(meta ?? {}, message);
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(meta ?? {}, message);
    }

    error(message: string, error?: unknown, meta?: LogMeta): void {
        const errorMeta = error instanceof Error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : error === undefined ? {} : { error: String(error) };

        this.logger.error({ ...meta, ...errorMeta }, message);
    }

    cache(message: string, meta?: LogMeta): void {
        this.debug(`[CACHE] ${message}`, meta);
    }

    http(message: string, meta?: LogMeta): void {
        this.info(`[HTTP] ${message}`, meta);
    }

    child(context: LogContext): LoggerService {
        return new LoggerService(this.logger.child(context));
    }
}

export const logger = LoggerService.getInstance();

export { LoggerService };
