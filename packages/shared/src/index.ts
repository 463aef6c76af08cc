/**
 * @fileoverview Logging and configuration shared by tierq front ends
 */

// Configuration Management
export type {
  DispatcherConfig,
  DispatcherConfigOptions,
  EnvOptions,
  LayeredLoadOptions
} from './config/index.js';
export {
  DispatcherConfigSchema,
  ConfigManager,
  configManager,
  loadDispatcherConfig,
  parsePriorityClasses,
  toCamelCase,
  formatOf,
  DEFAULT_PROCESS_COUNT,
  ENV_PREFIX
} from './config/index.js';

// Structured Logging
export type {
  LogContext,
  LoggerConfig
} from './logger/index.js';
export {
  Logger,
  LoggerFactory,
  defaultLoggerConfig
} from './logger/index.js';
