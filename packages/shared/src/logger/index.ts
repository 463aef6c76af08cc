/**
 * @fileoverview Structured logging framework using Pino for tierq
 */

import { hostname } from 'os';
import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import { LogLevel } from '@tierq/core';
import type { Environment } from '@tierq/core';

/**
 * Log context interface for structured logging
 */
export interface LogContext {
  readonly component?: string;
  readonly operation?: string;
  readonly taskId?: string;
  readonly taskName?: string;
  readonly priority?: number;
  readonly duration?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  readonly level: LogLevel;
  readonly environment: Environment;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly prettyPrint?: boolean;
  readonly enableRedaction?: boolean;
  readonly redactPaths?: string[];
  /** 'stdout', 'stderr' or a file path */
  readonly destination?: string;
  /** Explicit stream; takes precedence over destination and prettyPrint */
  readonly stream?: DestinationStream;
}

const REDACTED_PATHS = ['password', 'token', 'apiKey', 'secret', 'authorization'];

/**
 * pino wrapper with overloads for error-first logging and context merging
 */
export class Logger {
  private pino: PinoLogger;
  private readonly baseContext: LogContext;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig, baseContext: LogContext = {}, instance?: PinoLogger) {
    this.config = config;
    this.baseContext = baseContext;
    this.pino = instance ?? this.createPinoLogger(config).child(baseContext);
  }

  private createPinoLogger(config: LoggerConfig): PinoLogger {
    const options: LoggerOptions = {
      name: config.serviceName,
      level: config.level,
      base: {
        service: config.serviceName,
        version: config.serviceVersion,
        environment: config.environment,
        pid: process.pid,
        hostname: process.env['HOSTNAME'] ?? hostname()
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label })
      }
    };

    if (config.enableRedaction) {
      options.redact = {
        paths: [...REDACTED_PATHS, ...(config.redactPaths ?? [])],
        censor: '[REDACTED]'
      };
    }

    if (config.stream) {
      return pino(options, config.stream);
    }

    if (config.prettyPrint && config.environment === 'development') {
      return pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            destination: prettyDestination(config.destination)
          }
        }
      });
    }

    return pino(options, resolveDestination(config.destination));
  }

  get level(): string {
    return this.pino.level;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const mergedContext = { ...this.baseContext, ...context };
    return new Logger(this.config, mergedContext, this.pino.child(context));
  }

  trace(message: string, context?: LogContext): void;
  trace(error: Error, message: string, context?: LogContext): void;
  trace(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.TRACE, messageOrError, messageOrContext, context);
  }

  debug(message: string, context?: LogContext): void;
  debug(error: Error, message: string, context?: LogContext): void;
  debug(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.DEBUG, messageOrError, messageOrContext, context);
  }

  info(message: string, context?: LogContext): void;
  info(error: Error, message: string, context?: LogContext): void;
  info(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.INFO, messageOrError, messageOrContext, context);
  }

  warn(message: string, context?: LogContext): void;
  warn(error: Error, message: string, context?: LogContext): void;
  warn(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.WARN, messageOrError, messageOrContext, context);
  }

  error(message: string, context?: LogContext): void;
  error(error: Error, message?: string, context?: LogContext): void;
  error(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.ERROR, messageOrError, messageOrContext, context);
  }

  fatal(message: string, context?: LogContext): void;
  fatal(error: Error, message?: string, context?: LogContext): void;
  fatal(messageOrError: string | Error, messageOrContext?: string | LogContext, context?: LogContext): void {
    this.log(LogLevel.FATAL, messageOrError, messageOrContext, context);
  }

  private log(
    level: LogLevel,
    messageOrError: string | Error,
    messageOrContext?: string | LogContext,
    context?: LogContext
  ): void {
    const logContext: Record<string, unknown> = {};
    let message: string;

    if (messageOrError instanceof Error) {
      message = typeof messageOrContext === 'string' ? messageOrContext : messageOrError.message;
      logContext['error'] = {
        name: messageOrError.name,
        message: messageOrError.message,
        stack: messageOrError.stack,
        ...(messageOrError.cause ? { cause: messageOrError.cause } : {})
      };
    } else {
      message = messageOrError;
    }

    if (typeof messageOrContext === 'object') {
      Object.assign(logContext, messageOrContext);
    }
    if (context) {
      Object.assign(logContext, context);
    }

    this.pino[level](logContext, message);
  }

  /**
   * Flush pending entries; call before process exit
   */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pino.flush((error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

function resolveDestination(destination: string | undefined): DestinationStream {
  if (!destination || destination === 'stdout') {
    return pino.destination(1);
  }
  if (destination === 'stderr') {
    return pino.destination(2);
  }
  return pino.destination({ dest: destination, sync: false, mkdir: true });
}

function prettyDestination(destination: string | undefined): number | string {
  if (!destination || destination === 'stdout') return 1;
  if (destination === 'stderr') return 2;
  return destination;
}

/**
 * Logger factory for creating service-specific loggers
 */
export class LoggerFactory {
  private static loggers = new Map<string, Logger>();

  /**
   * Create or get a logger for a service. Loggers bound to an explicit
   * stream are never cached.
   */
  static createLogger(
    serviceName: string,
    config: Omit<LoggerConfig, 'serviceName'>,
    baseContext?: LogContext
  ): Logger {
    if (config.stream) {
      return new Logger({ ...config, serviceName }, baseContext);
    }

    const key = `${serviceName}-${JSON.stringify(config)}-${JSON.stringify(baseContext ?? {})}`;
    const cached = this.loggers.get(key);
    if (cached) {
      return cached;
    }

    const logger = new Logger({ ...config, serviceName }, baseContext);
    this.loggers.set(key, logger);
    return logger;
  }

  static createDispatcherLogger(config: Omit<LoggerConfig, 'serviceName'>): Logger {
    return this.createLogger('tierq', config, { component: 'dispatcher' });
  }

  static clearCache(): void {
    this.loggers.clear();
  }
}

export const defaultLoggerConfig: Omit<LoggerConfig, 'serviceName'> = {
  level: LogLevel.WARN,
  environment: 'development',
  serviceVersion: '0.1.0',
  prettyPrint: false,
  enableRedaction: true,
  destination: 'stderr'
};
