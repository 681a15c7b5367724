/**
 * @module verdict
 * @description Verdict constructors and the fixed reason/confidence table
 *
 * Confidences are constants per detector branch, not computed from match
 * strength.
 */

import type {
  DetectedPII,
  SafeVerdict,
  UnsafeVerdict,
} from '../../contracts/index.js';
import type { VerdictRule } from './types.js';

export type VerdictRuleName =
  | 'harmfulInput'
  | 'harmfulOutput'
  | 'leakage'
  | 'instructionOverride'
  | 'roleManipulation'
  | 'pii';

export const VERDICT_RULES: Readonly<Record<VerdictRuleName, VerdictRule>> = {
  harmfulInput: {
    detector: 'harmful_content',
    reason: 'Potentially harmful content detected',
    confidence: 0.8,
  },
  harmfulOutput: {
    detector: 'harmful_content',
    reason: 'Harmful content in model output',
    confidence: 0.9,
  },
  leakage: {
    detector: 'system_prompt_leakage',
    reason: 'Potential system prompt leakage',
    confidence: 0.7,
  },
  instructionOverride: {
    detector: 'jailbreak',
    reason: 'Potential jailbreak attempt detected',
    confidence: 0.8,
  },
  roleManipulation: {
    detector: 'jailbreak',
    reason: 'Role manipulation attempt detected',
    confidence: 0.7,
  },
  pii: {
    detector: 'pii',
    reason: 'PII detected in text',
    confidence: 0.9,
  },
};

const SAFE: SafeVerdict = { is_safe: true, reason: null, confidence: 1 };

export function safeVerdict(): SafeVerdict {
  return { ...SAFE };
}

export function unsafeVerdict(
  rule: VerdictRule,
  evidence: {
    category?: string;
    matchedPattern?: string;
    detectedPII?: DetectedPII[];
  } = {}
): UnsafeVerdict {
  return {
    is_safe: false,
    reason: rule.reason,
    confidence: rule.confidence,
    detector: rule.detector,
    ...(evidence.category !== undefined && { category: evidence.category }),
    ...(evidence.matchedPattern !== undefined && { matched_pattern: evidence.matchedPattern }),
    ...(evidence.detectedPII !== undefined && { detected_pii: evidence.detectedPII }),
  };
}

/**
 * Verdict for text over the length limit. No pattern was evaluated.
 */
export function inputLimitVerdict(limit: number): UnsafeVerdict {
  return unsafeVerdict({
    detector: 'input_limit',
    reason: `Text exceeds maximum length of ${limit} characters`,
    confidence: 1,
  });
}
