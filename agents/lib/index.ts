/**
 * @module lib
 * @description Shared infrastructure for the content safety engine
 *
 * - Structured logging
 * - Environment configuration
 * - Input size boundaries
 * - Error types
 */

// Structured logging
export {
  structuredLog,
  setLogLevel,
  getLogLevel,
  setLogWriter,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogWriter,
} from './structured-log.js';

// Environment configuration
export {
  loadEngineConfig,
  type Environment,
  type HostConfig,
} from './environment.js';

// Performance boundaries
export {
  PERFORMANCE_LIMITS,
  PerformanceTracker,
  checkInputLength,
  type InputLengthCheck,
} from './performance-boundaries.js';

// Errors
export {
  ContentSafetyError,
  InvalidPatternError,
  RequestValidationError,
  ConfigurationError,
} from './errors.js';
