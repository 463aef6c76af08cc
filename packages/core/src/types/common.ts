/**
 * @fileoverview Common utility types for tierq
 */

import { z } from 'zod';

/**
 * String literal union for environment types
 */
export type Environment = 'development' | 'staging' | 'production' | 'test';

/**
 * Log level enumeration
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

/**
 * Generic configuration interface
 */
export interface BaseConfig {
  readonly environment: Environment;
  readonly logLevel: LogLevel;
  readonly version: string;
}

export const LogLevelSchema = z.nativeEnum(LogLevel);
export const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);

export const BaseConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  logLevel: LogLevelSchema.default(LogLevel.INFO),
  version: z.string().default('0.1.0')
});
