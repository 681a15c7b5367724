/**
 * @module patterns
 * @description Detection pattern tables for the content safety engine
 *
 * Pattern IDs follow format: {family}-{category}-{number}.
 * Engines compile these tables into instance-owned lists.
 *
 * IMPORTANT: Harmful-content patterns reference violent, illegal and sexual
 * terms for detection purposes only.
 */

import type { HarmfulCategory } from '../../contracts/index.js';
import { InvalidPatternError } from '../../lib/errors.js';
import type {
  CompiledPattern,
  HarmfulPattern,
  JailbreakPattern,
  LeakagePattern,
  PIIPattern,
} from './types.js';

// =============================================================================
// HARMFUL CONTENT
// =============================================================================

/**
 * Compound patterns: a topic term followed by an intent or target term.
 * `\b` only knows ASCII word characters, so a term followed by a non-ASCII
 * letter ("killé") still ends on a boundary and matches.
 */
export const HARMFUL_PATTERNS: readonly HarmfulPattern[] = [
  {
    id: 'hc-violence-1',
    pattern: '\\b(?:kill|murder|assassinate|hurt|harm|attack|violence)\\b.*\\b(?:you|me|someone|people)\\b',
    category: 'violence',
    description: 'Violent act directed at a person',
  },
  {
    id: 'hc-violence-2',
    pattern: '\\b(?:bomb|explosive|weapon|gun|knife)\\b.*\\b(?:make|build|create|instructions)\\b',
    category: 'violence',
    description: 'Weapon construction',
  },
  {
    id: 'hc-illegal-1',
    pattern: '\\b(?:drugs|narcotics|cocaine|heroin|meth)\\b.*\\b(?:how to|make|buy|sell)\\b',
    category: 'illegal_activity',
    description: 'Drug production or trade',
  },
  {
    id: 'hc-illegal-2',
    pattern: '\\b(?:hack|hacking|phishing|malware)\\b.*\\b(?:tutorial|guide|instructions)\\b',
    category: 'illegal_activity',
    description: 'Intrusion or malware how-to',
  },
  {
    id: 'hc-hate-1',
    pattern: '\\b(?:hate|racist|discrimination)\\b.*\\b(?:against|towards)\\b',
    category: 'hate_speech',
    description: 'Hate directed at a group',
  },
  {
    id: 'hc-self-harm-1',
    pattern: '\\b(?:suicide|self-harm|cut myself|kill myself)\\b',
    category: 'self_harm',
    description: 'Self-harm or suicide reference',
  },
  {
    id: 'hc-sexual-1',
    pattern: '\\b(?:sex|sexual|porn|pornography)\\b.*\\b(?:explicit|graphic|detailed)\\b',
    category: 'sexual_content',
    description: 'Explicit sexual content request',
  },
];

// =============================================================================
// JAILBREAK
// =============================================================================

/**
 * Instruction-override patterns come first: evaluation order is precedence.
 */
export const JAILBREAK_PATTERNS: readonly JailbreakPattern[] = [
  {
    id: 'jb-override-1',
    pattern: 'ignore\\s+(?:previous|above|all)\\s+instructions',
    category: 'instruction_override',
    description: 'Ignore prior instructions',
  },
  {
    id: 'jb-override-2',
    pattern: 'pretend\\s+(?:you are|to be)\\s+(?:not|an?).*ai',
    category: 'instruction_override',
    description: 'Pretend to be (not) an AI',
  },
  {
    id: 'jb-override-3',
    pattern: 'act\\s+as\\s+(?:if|though)\\s+you\\s+(?:are|were)',
    category: 'instruction_override',
    description: 'Act as if you were',
  },
  {
    id: 'jb-override-4',
    pattern: 'roleplay\\s+as',
    category: 'instruction_override',
    description: 'Roleplay request',
  },
  {
    id: 'jb-override-5',
    pattern: 'simulate\\s+being',
    category: 'instruction_override',
    description: 'Simulation request',
  },
  {
    id: 'jb-override-6',
    pattern: 'you\\s+are\\s+now\\s+(?:a|an)\\s+(?:uncensored|unfiltered)',
    category: 'instruction_override',
    description: 'Uncensored persona',
  },
  {
    id: 'jb-role-1',
    pattern: 'you\\s+are\\s+(?:now|no longer)\\s+(?:a|an)',
    category: 'role_manipulation',
    description: 'Identity reassignment',
  },
  {
    id: 'jb-role-2',
    pattern: 'from\\s+now\\s+on\\s+you\\s+(?:are|will be)',
    category: 'role_manipulation',
    description: 'Persistent persona change',
  },
  {
    id: 'jb-role-3',
    pattern: 'forget\\s+that\\s+you\\s+are\\s+an?\\s+ai',
    category: 'role_manipulation',
    description: 'Forget AI identity',
  },
  {
    id: 'jb-role-4',
    pattern: 'you\\s+must\\s+(?:not|never)\\s+(?:mention|say|tell)',
    category: 'role_manipulation',
    description: 'Disclosure suppression',
  },
];

// =============================================================================
// OUTPUT LEAKAGE
// =============================================================================

export const LEAKAGE_PATTERNS: readonly LeakagePattern[] = [
  {
    id: 'leak-prompt-1',
    pattern: 'you are a helpful assistant',
    description: 'Recited system prompt',
  },
  {
    id: 'leak-identity-1',
    pattern: '\\b(?:i am|as) an ai language model\\b',
    description: 'Self-identification as a language model',
  },
  {
    id: 'leak-identity-2',
    pattern: 'as an ai assistant',
    description: 'Self-identification as an assistant',
  },
  {
    id: 'leak-training-1',
    pattern: 'my training data',
    description: 'Training data reference',
  },
  {
    id: 'leak-provider-1',
    pattern: 'openai',
    description: 'Provider name',
  },
  {
    id: 'leak-provider-2',
    pattern: 'gpt-[0-9]',
    description: 'Model family name',
  },
];

// =============================================================================
// PII
// =============================================================================

export const PII_PATTERNS: readonly PIIPattern[] = [
  {
    id: 'pii-email',
    type: 'email',
    pattern: '\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Z|a-z]{2,}\\b',
    description: 'Email address',
  },
  {
    id: 'pii-phone',
    type: 'phone',
    pattern: '\\b\\d{3}[-.]?\\d{3}[-.]?\\d{4}\\b',
    description: 'Phone number (dashed or dotted)',
  },
  {
    id: 'pii-phone-area',
    type: 'phone',
    pattern: '\\(\\d{3}\\)\\s*\\d{3}[-.]?\\d{4}',
    description: 'Phone number (parenthesized area code)',
  },
  {
    id: 'pii-ssn',
    type: 'ssn',
    pattern: '\\b\\d{3}-\\d{2}-\\d{4}\\b',
    description: 'US Social Security Number',
  },
  {
    id: 'pii-credit-card',
    type: 'credit_card',
    pattern: '\\b\\d{4}[-\\s]?\\d{4}[-\\s]?\\d{4}[-\\s]?\\d{4}\\b',
    description: 'Credit card number (16 digits, grouped)',
  },
  {
    id: 'pii-ipv4',
    type: 'ip_address',
    pattern: '\\b\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\b',
    description: 'IPv4 address',
  },
];

/**
 * Redaction order and placeholders. IP addresses and parenthesized phone
 * numbers are detected but not redacted.
 */
export const SANITIZE_RULES: ReadonlyArray<{ patternId: string; placeholder: string }> = [
  { patternId: 'pii-email', placeholder: '[EMAIL]' },
  { patternId: 'pii-phone', placeholder: '[PHONE]' },
  { patternId: 'pii-ssn', placeholder: '[SSN]' },
  { patternId: 'pii-credit-card', placeholder: '[CREDIT_CARD]' },
];

// =============================================================================
// COMPILATION
// =============================================================================

/**
 * Compile a pattern definition.
 *
 * @throws InvalidPatternError when the source is not a valid regular expression
 */
export function compilePattern<P extends { pattern: string }>(
  definition: P,
  flags: string = 'i'
): CompiledPattern<P> {
  let regex: RegExp;
  try {
    regex = new RegExp(definition.pattern, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidPatternError(definition.pattern, message);
  }
  return { ...definition, regex };
}

export function compileAll<P extends { pattern: string }>(
  definitions: readonly P[],
  flags: string = 'i'
): readonly CompiledPattern<P>[] {
  return definitions.map((d) => compilePattern(d, flags));
}

/**
 * Get PII pattern by ID
 */
export function getPIIPatternById(id: string): PIIPattern | undefined {
  return PII_PATTERNS.find((p) => p.id === id);
}

/**
 * Pattern count by harmful category
 */
export function getPatternCountByCategory(
  patterns: readonly HarmfulPattern[] = HARMFUL_PATTERNS
): Record<HarmfulCategory | string, number> {
  const counts: Record<string, number> = {};
  for (const p of patterns) {
    counts[p.category] = (counts[p.category] || 0) + 1;
  }
  return counts;
}
