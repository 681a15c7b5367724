/**
 * @module types
 * @description Internal type definitions for the content safety engine
 */

import type {
  DetectorKind,
  HarmfulCategory,
  JailbreakCategory,
  PIIType,
} from '../../contracts/index.js';

/**
 * Harmful-content pattern definition
 */
export interface HarmfulPattern {
  /** Unique pattern ID */
  id: string;
  /** Regex pattern string */
  pattern: string;
  /** Built-in category, or the category given to a custom pattern */
  category: HarmfulCategory | string;
  /** Human-readable description */
  description: string;
}

/**
 * Jailbreak pattern definition
 */
export interface JailbreakPattern {
  id: string;
  pattern: string;
  category: JailbreakCategory;
  description: string;
}

/**
 * Output-leakage pattern definition
 */
export interface LeakagePattern {
  id: string;
  pattern: string;
  description: string;
}

/**
 * Typed PII pattern definition
 */
export interface PIIPattern {
  id: string;
  type: PIIType;
  pattern: string;
  description: string;
}

/**
 * A pattern definition together with its compiled expression.
 * The expression has no `g` flag, so `test` carries no state between calls.
 */
export type CompiledPattern<P extends { pattern: string }> = P & {
  readonly regex: RegExp;
};

/**
 * Reason and confidence attached to one detector branch
 */
export interface VerdictRule {
  detector: DetectorKind;
  reason: string;
  confidence: number;
}
