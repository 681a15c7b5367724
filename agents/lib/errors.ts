/**
 * @module errors
 * @description Error types for the content safety engine
 */

import type { ErrorCode, FieldError } from '../contracts/index.js';

/**
 * Base error class for all engine errors.
 */
export class ContentSafetyError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'ContentSafetyError';
    this.code = code;
  }
}

/**
 * Thrown when a pattern does not compile as a regular expression.
 * Never escapes `addCustomPattern`.
 */
export class InvalidPatternError extends ContentSafetyError {
  public readonly pattern: string;

  constructor(pattern: string, cause: string) {
    super(`Invalid regex pattern: ${pattern} (${cause})`, 'INVALID_PATTERN');
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

/**
 * Thrown when a request does not match its schema.
 */
export class RequestValidationError extends ContentSafetyError {
  public readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    super(
      `Input validation failed: ${errors.map((e) => `${e.path || '(root)'}: ${e.message}`).join('; ')}`,
      'VALIDATION_FAILED',
    );
    this.name = 'RequestValidationError';
    this.errors = errors;
  }
}

/**
 * Thrown at startup when environment configuration is unusable.
 */
export class ConfigurationError extends ContentSafetyError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'INVALID_CONFIGURATION');
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}
