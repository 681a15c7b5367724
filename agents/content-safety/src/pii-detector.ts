/**
 * PII Detector
 *
 * Structural (digit-shape) matching only. Any digit string of matching
 * shape is reported, and internationally formatted numbers are missed.
 *
 * @module content-safety/pii-detector
 */

import type { DetectedPII, PIIType, SafetyVerdict } from '../../contracts/index.js';
import { PII_PATTERNS, compileAll } from './patterns.js';
import type { CompiledPattern, PIIPattern } from './types.js';
import { VERDICT_RULES, safeVerdict, unsafeVerdict } from './verdict.js';

const MAX_EXAMPLES = 2;

export class PIIDetector {
  private readonly patterns: readonly CompiledPattern<PIIPattern>[];

  constructor(patterns: readonly CompiledPattern<PIIPattern>[] = compileAll(PII_PATTERNS, '')) {
    this.patterns = patterns;
  }

  /**
   * Find every PII match, grouped per type in pattern order.
   * Patterns sharing a type (the two phone formats) report one entry.
   */
  detect(content: string): DetectedPII[] {
    const byType = new Map<PIIType, string[]>();

    for (const pattern of this.patterns) {
      const regex = new RegExp(pattern.regex.source, pattern.regex.flags + 'g');
      const matches = content.match(regex);
      if (!matches) continue;

      const existing = byType.get(pattern.type);
      if (existing) {
        existing.push(...matches);
      } else {
        byType.set(pattern.type, [...matches]);
      }
    }

    return [...byType].map(([type, matches]) => ({
      type,
      count: matches.length,
      examples: matches.slice(0, MAX_EXAMPLES),
    }));
  }

  check(content: string): SafetyVerdict {
    const detected = this.detect(content);
    if (detected.length === 0) {
      return safeVerdict();
    }
    return unsafeVerdict(VERDICT_RULES.pii, {
      category: 'pii',
      detectedPII: detected,
    });
  }
}
