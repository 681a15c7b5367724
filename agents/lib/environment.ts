/**
 * @module environment
 * @description Environment configuration for hosts of the content safety engine
 *
 * The engine never reads the environment itself. Hosts (the CLI, an API
 * layer) call `loadEngineConfig` once at startup and pass the result in.
 *
 * Recognised Environment Variables:
 * - CONTENT_FILTER_ENABLED: "true" (default) / "false"
 * - PII_DETECTION_ENABLED: "true" (default) / "false"
 * - JAILBREAK_DETECTION_ENABLED: "true" (default) / "false"
 * - SAFETY_MAX_INPUT_LENGTH: positive integer (default 8000)
 * - LOG_LEVEL: debug | info | warn | error (default info)
 * - TELEMETRY_ENABLED: "true" / "false" (default)
 */

import { EngineConfig, DEFAULT_MAX_INPUT_LENGTH } from '../contracts/index.js';
import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './structured-log.js';

// =============================================================================
// TYPES
// =============================================================================

export type Environment = Record<string, string | undefined>;

export interface HostConfig {
  engine: EngineConfig;
  logLevel: LogLevel;
  telemetryEnabled: boolean;
}

// =============================================================================
// PARSERS
// =============================================================================

/**
 * Flags are on only when the value is "true", in any case.
 * Unset or blank falls back to the default.
 */
function readFlag(env: Environment, name: string, fallback: boolean): boolean {
  const value = env[name];
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

function readPositiveInt(
  env: Environment,
  name: string,
  fallback: number,
  problems: string[]
): number {
  const value = env[name];
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    problems.push(`Invalid ${name}: "${value}". Must be a positive integer`);
    return fallback;
  }
  return parsed;
}

// =============================================================================
// LOADER
// =============================================================================

export function loadEngineConfig(env: Environment = process.env): HostConfig {
  const problems: string[] = [];

  const maxInputLength = readPositiveInt(
    env,
    'SAFETY_MAX_INPUT_LENGTH',
    DEFAULT_MAX_INPUT_LENGTH,
    problems
  );

  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    problems.push(`Invalid LOG_LEVEL: "${env.LOG_LEVEL}". Must be one of: debug, info, warn, error`);
  }

  const parsed = EngineConfig.safeParse({
    contentFilterEnabled: readFlag(env, 'CONTENT_FILTER_ENABLED', true),
    piiDetectionEnabled: readFlag(env, 'PII_DETECTION_ENABLED', true),
    jailbreakDetectionEnabled: readFlag(env, 'JAILBREAK_DETECTION_ENABLED', true),
    maxInputLength,
  });

  if (!parsed.success) {
    problems.push(
      ...parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  if (problems.length > 0 || !parsed.success) {
    throw new ConfigurationError(problems);
  }

  return {
    engine: parsed.data,
    logLevel,
    telemetryEnabled: readFlag(env, 'TELEMETRY_ENABLED', false),
  };
}
