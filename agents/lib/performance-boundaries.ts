/**
 * @module performance-boundaries
 * @description Input size boundary and timing for engine checks
 *
 * Oversized text is rejected before any pattern runs.
 */

import { DEFAULT_MAX_INPUT_LENGTH } from '../contracts/index.js';

// =============================================================================
// PERFORMANCE CONSTANTS
// =============================================================================

export const PERFORMANCE_LIMITS = {
  MAX_INPUT_CHARS: DEFAULT_MAX_INPUT_LENGTH,
} as const;

// =============================================================================
// TYPES
// =============================================================================

export interface InputLengthCheck {
  valid: boolean;
  length: number;
  limit: number;
}

// =============================================================================
// TRACKER
// =============================================================================

export class PerformanceTracker {
  private readonly startTime: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Get current elapsed time, rounded to microseconds
   */
  getElapsedMs(): number {
    return Math.round((performance.now() - this.startTime) * 1000) / 1000;
  }
}

// =============================================================================
// INPUT LENGTH
// =============================================================================

/**
 * Check text length against a character limit
 */
export function checkInputLength(
  content: string,
  limit: number = PERFORMANCE_LIMITS.MAX_INPUT_CHARS
): InputLengthCheck {
  return {
    valid: content.length <= limit,
    length: content.length,
    limit,
  };
}
