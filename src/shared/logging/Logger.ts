/**
 * Application logger based on pino.
 * This provides structured, JSON logs suitable for production.
 */
import pino, { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import { config } from '../config/Config';

export type AppLogger = PinoLogger;

export type CreateLoggerOptions = {
  level?: string;
  /** Write JSON lines here instead of stdout; pretty printing is then off. */
  destination?: DestinationStream;
};

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || (config.env === 'production' ? 'info' : 'debug');
}

/**
 * Build a logger with the service bindings. Errors logged under `err` keep
 * their own fields, so a Failure shows its kind and details.
 */
export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const pretty = config.env === 'development' && !options.destination;

  const pinoOptions: LoggerOptions = {
    level: options.level ?? resolveLogLevel(),
    base: {
      service: config.serviceName,
      version: config.serviceVersion,
      env: config.env,
    },
    serializers: { err: pino.stdSerializers.err },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

export const logger: AppLogger = createLogger();
