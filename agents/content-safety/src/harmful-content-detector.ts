/**
 * Harmful Content Detector
 *
 * Scans text against ordered compound patterns. For model output it also
 * looks for system-prompt leakage.
 *
 * @module content-safety/harmful-content-detector
 */

import type { Direction, SafetyVerdict } from '../../contracts/index.js';
import {
  HARMFUL_PATTERNS,
  LEAKAGE_PATTERNS,
  compileAll,
} from './patterns.js';
import type { CompiledPattern, HarmfulPattern, LeakagePattern } from './types.js';
import { VERDICT_RULES, safeVerdict, unsafeVerdict } from './verdict.js';

/**
 * Harmful Content Detector class
 *
 * Immutable: `withPattern` returns a new detector, so a detector shared
 * between callers never changes under them.
 */
export class HarmfulContentDetector {
  private readonly patterns: readonly CompiledPattern<HarmfulPattern>[];
  private readonly leakagePatterns: readonly CompiledPattern<LeakagePattern>[];

  constructor(
    patterns: readonly CompiledPattern<HarmfulPattern>[] = compileAll(HARMFUL_PATTERNS),
    leakagePatterns: readonly CompiledPattern<LeakagePattern>[] = compileAll(LEAKAGE_PATTERNS)
  ) {
    this.patterns = patterns;
    this.leakagePatterns = leakagePatterns;
  }

  /**
   * Check text for harmful content
   *
   * @param content - Text to scan
   * @param direction - `output` adds the leakage check and raises confidence
   */
  check(content: string, direction: Direction): SafetyVerdict {
    const rule = direction === 'input' ? VERDICT_RULES.harmfulInput : VERDICT_RULES.harmfulOutput;

    for (const pattern of this.patterns) {
      if (pattern.regex.test(content)) {
        return unsafeVerdict(rule, {
          category: pattern.category,
          matchedPattern: pattern.pattern,
        });
      }
    }

    if (direction === 'output') {
      return this.checkLeakage(content);
    }

    return safeVerdict();
  }

  /**
   * Check model output for recited instructions or model self-identification
   */
  checkLeakage(content: string): SafetyVerdict {
    for (const pattern of this.leakagePatterns) {
      if (pattern.regex.test(content)) {
        return unsafeVerdict(VERDICT_RULES.leakage, {
          category: 'system_prompt_leakage',
          matchedPattern: pattern.pattern,
        });
      }
    }
    return safeVerdict();
  }

  /**
   * Return a detector with one more pattern appended
   */
  withPattern(pattern: CompiledPattern<HarmfulPattern>): HarmfulContentDetector {
    return new HarmfulContentDetector([...this.patterns, pattern], this.leakagePatterns);
  }

  get patternCount(): number {
    return this.patterns.length;
  }

  /**
   * Pattern definitions in evaluation order
   */
  listPatterns(): HarmfulPattern[] {
    return this.patterns.map(({ id, pattern, category, description }) => ({
      id,
      pattern,
      category,
      description,
    }));
  }
}
