/**
 * @module contracts
 * @description Schema definitions for the content safety engine
 *
 * Every shape that crosses a module boundary (verdicts, configuration,
 * statistics, safety-check requests) is declared here as a zod schema,
 * with the TypeScript type inferred from it.
 */

import { z } from 'zod';

// =============================================================================
// CORE ENUMS
// =============================================================================

/**
 * Direction of the text being checked
 */
export const Direction = z.enum([
  'input',   // User input headed to the model
  'output',  // Model output headed to the user
]);
export type Direction = z.infer<typeof Direction>;

/**
 * Categories of the built-in harmful-content patterns
 */
export const HarmfulCategory = z.enum([
  'violence',
  'illegal_activity',
  'hate_speech',
  'self_harm',
  'sexual_content',
]);
export type HarmfulCategory = z.infer<typeof HarmfulCategory>;

/**
 * Sub-categories of jailbreak patterns, in evaluation order
 */
export const JailbreakCategory = z.enum([
  'instruction_override',
  'role_manipulation',
]);
export type JailbreakCategory = z.infer<typeof JailbreakCategory>;

/**
 * PII types detectable by structure
 */
export const PIIType = z.enum([
  'email',
  'phone',
  'ssn',
  'credit_card',
  'ip_address',
]);
export type PIIType = z.infer<typeof PIIType>;

/**
 * Detector that produced an unsafe verdict
 */
export const DetectorKind = z.enum([
  'harmful_content',
  'system_prompt_leakage',
  'jailbreak',
  'pii',
  'input_limit',
]);
export type DetectorKind = z.infer<typeof DetectorKind>;

// =============================================================================
// VERDICTS
// =============================================================================

/**
 * PII found in a text, grouped by type
 */
export const DetectedPII = z.object({
  /** PII type */
  type: PIIType,
  /** Number of matches of this type */
  count: z.number().int().min(1),
  /** First matches, raw (at most two) */
  examples: z.array(z.string()).max(2),
});
export type DetectedPII = z.infer<typeof DetectedPII>;

export const SafeVerdict = z.object({
  is_safe: z.literal(true),
  reason: z.null(),
  confidence: z.number().min(0).max(1),
});
export type SafeVerdict = z.infer<typeof SafeVerdict>;

export const UnsafeVerdict = z.object({
  is_safe: z.literal(false),
  /** Human-readable reason */
  reason: z.string().min(1),
  /** Fixed confidence constant of the branch that fired */
  confidence: z.number().min(0).max(1),
  /** Detector that fired */
  detector: DetectorKind,
  /** Pattern category (harmful category, jailbreak sub-category, ...) */
  category: z.string().optional(),
  /** Source of the regular expression that matched */
  matched_pattern: z.string().optional(),
  /** PII findings, one entry per type */
  detected_pii: z.array(DetectedPII).optional(),
});
export type UnsafeVerdict = z.infer<typeof UnsafeVerdict>;

/**
 * Result of a single content check
 */
export const SafetyVerdict = z.discriminatedUnion('is_safe', [SafeVerdict, UnsafeVerdict]);
export type SafetyVerdict = z.infer<typeof SafetyVerdict>;

// =============================================================================
// CONFIGURATION
// =============================================================================

export const DEFAULT_ALLOWED_CATEGORIES = [
  'educational',
  'informational',
  'creative',
  'analytical',
  'technical',
  'scientific',
  'business',
  'academic',
] as const;

export const DEFAULT_MAX_INPUT_LENGTH = 8000;

/**
 * Engine configuration, fixed at construction
 */
export const EngineConfig = z.object({
  /** Master switch consulted by the safety gate */
  contentFilterEnabled: z.boolean().default(true),
  /** Run the PII detector on input */
  piiDetectionEnabled: z.boolean().default(true),
  /** Run the jailbreak detector on input */
  jailbreakDetectionEnabled: z.boolean().default(true),
  /** Allowed content categories (informational, not enforced) */
  allowedCategories: z.array(z.string()).default([...DEFAULT_ALLOWED_CATEGORIES]),
  /** Texts longer than this are rejected without pattern evaluation */
  maxInputLength: z.number().int().positive().default(DEFAULT_MAX_INPUT_LENGTH),
});
export type EngineConfig = z.infer<typeof EngineConfig>;
export type EngineConfigInput = z.input<typeof EngineConfig>;

/**
 * Read-only snapshot of the loaded patterns and toggles
 */
export const FilterStats = z.object({
  harmful_pattern_count: z.number().int().min(0),
  jailbreak_pattern_count: z.number().int().min(0),
  content_filter_enabled: z.boolean(),
  pii_detection_enabled: z.boolean(),
  jailbreak_detection_enabled: z.boolean(),
});
export type FilterStats = z.infer<typeof FilterStats>;

// =============================================================================
// SAFETY CHECK
// =============================================================================

export const CheckType = z.enum(['input', 'output', 'both']);
export type CheckType = z.infer<typeof CheckType>;

/**
 * Combined input/output check request
 */
export const SafetyCheckRequest = z.object({
  /** Text to check */
  text: z.string(),
  /** Which directions to check */
  check_type: CheckType.default('both'),
});
export type SafetyCheckRequest = z.infer<typeof SafetyCheckRequest>;

export const SafetyCheckResult = z.object({
  input_check: SafetyVerdict,
  output_check: SafetyVerdict,
  overall_safe: z.boolean(),
});
export type SafetyCheckResult = z.infer<typeof SafetyCheckResult>;

// =============================================================================
// ERRORS
// =============================================================================

export const ErrorCode = z.enum([
  'INVALID_PATTERN',
  'VALIDATION_FAILED',
  'INVALID_CONFIGURATION',
]);
export type ErrorCode = z.infer<typeof ErrorCode>;

/**
 * Per-field validation problem
 */
export const FieldError = z.object({
  path: z.string(),
  message: z.string(),
});
export type FieldError = z.infer<typeof FieldError>;
