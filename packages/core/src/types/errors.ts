/**
 * @fileoverview Error handling types and custom error classes for tierq
 */

import { z } from 'zod';

/**
 * Error category enumeration
 */
export enum ErrorCategory {
  TASK_ERROR = 'task_error',
  VALIDATION_ERROR = 'validation_error',
  CONFIGURATION_ERROR = 'configuration_error',
  SYSTEM_ERROR = 'system_error'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Base error information interface
 */
export interface ErrorInfo {
  readonly code: string;
  readonly message: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown> | undefined;
  readonly stackTrace?: string | undefined;
  readonly retryable: boolean;
}

/**
 * Base tierq error class
 */
export abstract class TierqError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown> | undefined;
  public readonly retryable: boolean;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    retryable: boolean = false,
    context?: Record<string, unknown> | undefined
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to serializable object
   */
  toJSON(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      stackTrace: this.stack,
      retryable: this.retryable
    };
  }
}

/**
 * Task-related errors
 */
export class TaskError extends TierqError {
  constructor(
    code: string,
    message: string,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    retryable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(code, message, ErrorCategory.TASK_ERROR, severity, retryable, context);
  }
}

/**
 * A task was submitted with a priority class the manager does not recognise.
 * The manager's state is untouched, so the caller may resubmit with a valid class.
 */
export class InvalidPriorityClassError extends TaskError {
  public readonly priority: number;
  public readonly recognizedClasses: readonly number[];

  constructor(
    taskName: string,
    priority: number,
    recognizedClasses: readonly number[]
  ) {
    super(
      'INVALID_PRIORITY_CLASS',
      `Invalid priority (${priority}) for task '${taskName}'; recognized classes: ${recognizedClasses.join(', ')}`,
      ErrorSeverity.LOW,
      true,
      { taskName, priority, recognizedClasses: [...recognizedClasses] }
    );
    this.priority = priority;
    this.recognizedClasses = recognizedClasses;
  }
}

/**
 * Validation-related errors
 */
export class ValidationError extends TierqError {
  constructor(
    field: string,
    value: unknown,
    constraint: string
  ) {
    super(
      'VALIDATION_ERROR',
      `Validation failed for field '${field}': ${constraint}`,
      ErrorCategory.VALIDATION_ERROR,
      ErrorSeverity.LOW,
      false,
      { field, value, constraint }
    );
  }
}

/**
 * Invalid dispatcher or manager configuration
 */
export class ConfigurationError extends TierqError {
  public readonly issues: readonly string[];

  constructor(
    source: string,
    issues: readonly string[]
  ) {
    super(
      'CONFIGURATION_INVALID',
      `Configuration validation failed for ${source}:\n${issues.join('\n')}`,
      ErrorCategory.CONFIGURATION_ERROR,
      ErrorSeverity.HIGH,
      false,
      { source, issues: [...issues] }
    );
    this.issues = issues;
  }
}

/**
 * Check whether a value is one of the tierq errors
 */
export function isTierqError(error: unknown): error is TierqError {
  return error instanceof TierqError;
}

/**
 * Zod schemas for error validation
 */
export const ErrorCategorySchema = z.nativeEnum(ErrorCategory);
export const ErrorSeveritySchema = z.nativeEnum(ErrorSeverity);

export const ErrorInfoSchema = z.object({
  code: z.string().min(1),
  message: z.string().min(1),
  category: ErrorCategorySchema,
  severity: ErrorSeveritySchema,
  timestamp: z.date(),
  context: z.record(z.unknown()).optional(),
  stackTrace: z.string().optional(),
  retryable: z.boolean()
});
