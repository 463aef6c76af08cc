/**
 * @fileoverview Centralized Zod validation schemas for tierq
 */

import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../types/errors.js';

// Re-export all schemas from type files
export {
  TaskPrioritySchema,
  PriorityClassSchema,
  PriorityClassSetSchema,
  TaskInputSchema,
  TaskInputListSchema
} from '../types/task.js';

export {
  ErrorCategorySchema,
  ErrorSeveritySchema,
  ErrorInfoSchema
} from '../types/errors.js';

export {
  LogLevelSchema,
  EnvironmentSchema,
  BaseConfigSchema
} from '../types/common.js';

/**
 * Validation utility functions
 */
export class ValidationUtils {
  /**
   * Validate data against a Zod schema with detailed error messages
   */
  static validate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context?: string
  ): { success: true; data: T } | { success: false; errors: string[] } {
    const result = schema.safeParse(data);
    if (result.success) {
      return { success: true, data: result.data };
    }

    const contextPrefix = context ? `${context}.` : '';
    const errors = result.error.errors.map(err => {
      const path = err.path.length > 0 ? err.path.join('.') : 'root';
      return `${contextPrefix}${path}: ${err.message}`;
    });
    return { success: false, errors };
  }

  /**
   * Parse data or throw a ValidationError naming the first failing field
   */
  static parseOrThrow<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context = 'input'
  ): T {
    const result = schema.safeParse(data);
    if (result.success) {
      return result.data;
    }

    const [issue] = result.error.errors;
    const field = issue && issue.path.length > 0 ? `${context}.${issue.path.join('.')}` : context;
    throw new ValidationError(field, data, issue?.message ?? 'invalid value');
  }

  /**
   * Parse configuration or throw a ConfigurationError listing every issue
   */
  static parseConfig<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    source: string
  ): T {
    const result = this.validate(schema, data);
    if (!result.success) {
      throw new ConfigurationError(source, result.errors);
    }
    return result.data;
  }
}

