/**
 * @module structured-log
 * @description Structured JSON logging for the content safety engine
 *
 * One JSON object per line, on stdout unless a host installs another
 * writer. Entries NEVER contain the text being checked, only lengths,
 * hashes and verdict metadata.
 */

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogWriter = (line: string) => void;

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  component: string;
  message: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// LEVEL THRESHOLD
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let _minimumLevel: LogLevel = 'info';

let _writer: LogWriter = (line) => console.log(line);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  _minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return _minimumLevel;
}

/**
 * Replace the line writer
 *
 * @returns the writer that was installed before
 */
export function setLogWriter(writer: LogWriter): LogWriter {
  const previous = _writer;
  _writer = writer;
  return previous;
}

// =============================================================================
// STRUCTURED LOGGING
// =============================================================================

export function structuredLog(
  level: LogLevel,
  message: string,
  details?: Record<string, unknown>,
  component: string = 'content-safety'
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[_minimumLevel]) return;

  const entry: LogEntry = {
    level,
    timestamp: new Date().toISOString(),
    component,
    message,
    ...(details && { details }),
  };

  _writer(JSON.stringify(entry));
}
