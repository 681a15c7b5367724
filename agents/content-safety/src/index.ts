/**
 * @module content-safety
 * @description Rule-based content safety engine for LLM input and output
 *
 * Harmful-content, jailbreak and PII detection with fixed-confidence
 * verdicts, plus PII redaction.
 */

// Engine
export {
  ContentSafetyEngine,
  createEngine,
  ENGINE_IDENTITY,
  type EngineOptions,
} from './engine.js';

// Detectors
export { HarmfulContentDetector } from './harmful-content-detector.js';
export { JailbreakDetector } from './jailbreak-detector.js';
export { PIIDetector } from './pii-detector.js';
export { sanitize } from './sanitizer.js';

// Enforcement
export {
  SafetyGate,
  type ChatMessage,
  type ChatRole,
  type GateError,
  type GateOutcome,
} from './safety-gate.js';
export { runSafetyCheck, validateSafetyCheckRequest } from './safety-check.js';

// Patterns
export {
  HARMFUL_PATTERNS,
  JAILBREAK_PATTERNS,
  LEAKAGE_PATTERNS,
  PII_PATTERNS,
  SANITIZE_RULES,
  compilePattern,
  getPIIPatternById,
  getPatternCountByCategory,
} from './patterns.js';

// Verdicts
export { VERDICT_RULES, safeVerdict, unsafeVerdict, inputLimitVerdict } from './verdict.js';

// Types
export type {
  HarmfulPattern,
  JailbreakPattern,
  LeakagePattern,
  PIIPattern,
  CompiledPattern,
  VerdictRule,
} from './types.js';
export type {
  Direction,
  DetectedPII,
  EngineConfig,
  FilterStats,
  SafetyCheckRequest,
  SafetyCheckResult,
  SafetyVerdict,
  SafeVerdict,
  UnsafeVerdict,
} from '../../contracts/index.js';

// Telemetry
export {
  TelemetryEmitter,
  type TelemetryConfig,
  type TelemetryEvent,
  type TelemetryEventType,
  type TelemetrySink,
  type EngineIdentity,
} from './telemetry.js';

// Host support and errors
export {
  loadEngineConfig,
  setLogLevel,
  structuredLog,
  type HostConfig,
  type LogLevel,
  ContentSafetyError,
  InvalidPatternError,
  RequestValidationError,
  ConfigurationError,
} from '../../lib/index.js';
