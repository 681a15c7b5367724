/**
 * Jailbreak Detector
 *
 * Detects instruction-override and role-manipulation phrasing in user input.
 *
 * @module content-safety/jailbreak-detector
 */

import type { JailbreakCategory, SafetyVerdict } from '../../contracts/index.js';
import { JAILBREAK_PATTERNS, compileAll } from './patterns.js';
import type { CompiledPattern, JailbreakPattern, VerdictRule } from './types.js';
import { VERDICT_RULES, safeVerdict, unsafeVerdict } from './verdict.js';

const RULE_BY_CATEGORY: Record<JailbreakCategory, VerdictRule> = {
  instruction_override: VERDICT_RULES.instructionOverride,
  role_manipulation: VERDICT_RULES.roleManipulation,
};

export class JailbreakDetector {
  private readonly patterns: readonly CompiledPattern<JailbreakPattern>[];

  constructor(
    patterns: readonly CompiledPattern<JailbreakPattern>[] = compileAll(JAILBREAK_PATTERNS)
  ) {
    this.patterns = patterns;
  }

  /**
   * First match wins. Patterns are ordered so every instruction-override
   * pattern is tried before any role-manipulation pattern.
   */
  check(content: string): SafetyVerdict {
    for (const pattern of this.patterns) {
      if (pattern.regex.test(content)) {
        return unsafeVerdict(RULE_BY_CATEGORY[pattern.category], {
          category: pattern.category,
          matchedPattern: pattern.pattern,
        });
      }
    }
    return safeVerdict();
  }

  get patternCount(): number {
    return this.patterns.length;
  }
}
