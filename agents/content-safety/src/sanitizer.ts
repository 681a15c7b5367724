/**
 * Sanitizer
 *
 * Replaces PII with fixed placeholders before text is logged or stored.
 * Independent of the engine toggles.
 *
 * @module content-safety/sanitizer
 */

import { SANITIZE_RULES, getPIIPatternById } from './patterns.js';

interface RedactionStep {
  regex: RegExp;
  placeholder: string;
}

function buildSteps(): RedactionStep[] {
  return SANITIZE_RULES.map(({ patternId, placeholder }) => {
    const definition = getPIIPatternById(patternId);
    if (!definition) {
      throw new Error(`Sanitize rule references unknown pattern: ${patternId}`);
    }
    return { regex: new RegExp(definition.pattern, 'g'), placeholder };
  });
}

const STEPS: readonly RedactionStep[] = buildSteps();

/**
 * Redact emails, phone numbers, SSNs and credit card numbers, in that order.
 * Every occurrence is replaced; IP addresses are left as they are.
 */
export function sanitize(content: string): string {
  let sanitized = content;
  for (const step of STEPS) {
    // replace() resets lastIndex of a global regex before it starts
    sanitized = sanitized.replace(step.regex, step.placeholder);
  }
  return sanitized;
}
