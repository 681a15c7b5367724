/**
 * @module engine
 * @description Content Safety Engine implementation
 *
 * Evaluates user input and model output against the harmful-content,
 * jailbreak and PII detectors, and redacts PII for logging or storage.
 *
 * Precedence on input: harmful content, then jailbreak, then PII. The first
 * unsafe verdict is returned and later detectors do not run.
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
  EngineConfig,
  type Direction,
  type EngineConfigInput,
  type FilterStats,
  type SafetyVerdict,
} from '../../contracts/index.js';
import { ConfigurationError } from '../../lib/errors.js';
import { checkInputLength, PerformanceTracker } from '../../lib/performance-boundaries.js';
import { structuredLog } from '../../lib/structured-log.js';
import { HarmfulContentDetector } from './harmful-content-detector.js';
import { JailbreakDetector } from './jailbreak-detector.js';
import { compilePattern } from './patterns.js';
import { PIIDetector } from './pii-detector.js';
import { sanitize } from './sanitizer.js';
import {
  TelemetryEmitter,
  type EngineIdentity,
  type TelemetryConfig,
} from './telemetry.js';
import type { CompiledPattern, HarmfulPattern } from './types.js';
import { inputLimitVerdict, safeVerdict } from './verdict.js';

/**
 * Engine identity constant
 */
export const ENGINE_IDENTITY: EngineIdentity = {
  engine_id: 'content-safety-engine',
  engine_version: '1.0.0',
};

/**
 * Engine options: the engine configuration plus telemetry wiring
 */
export type EngineOptions = EngineConfigInput & {
  /** Telemetry configuration */
  telemetryConfig?: Partial<TelemetryConfig>;
};

/**
 * Content Safety Engine
 *
 * Responsibilities:
 * - Judge user input (harmful content, jailbreak attempts, PII)
 * - Judge model output (harmful content, system prompt leakage)
 * - Redact PII from text
 * - Accept custom harmful-content patterns at runtime
 *
 * Non-Responsibilities:
 * - Does NOT read environment variables or files
 * - Does NOT call models or perform I/O
 * - Does NOT enforce the allowed-category list
 */
export class ContentSafetyEngine {
  private readonly config: EngineConfig;
  private readonly telemetry: TelemetryEmitter;
  private readonly jailbreakDetector: JailbreakDetector;
  private readonly piiDetector: PIIDetector;
  /** Replaced wholesale when a custom pattern is added */
  private harmfulDetector: HarmfulContentDetector;
  private customPatternCount = 0;

  constructor(options: EngineOptions = {}) {
    const { telemetryConfig, ...engineConfig } = options;

    const parsed = EngineConfig.safeParse(engineConfig);
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
      );
    }

    this.config = parsed.data;
    this.harmfulDetector = new HarmfulContentDetector();
    this.jailbreakDetector = new JailbreakDetector();
    this.piiDetector = new PIIDetector();
    this.telemetry = new TelemetryEmitter(ENGINE_IDENTITY, telemetryConfig);
  }

  /**
   * Check user input before it reaches the model
   */
  checkInput(text: string): SafetyVerdict {
    return this.run('input', text);
  }

  /**
   * Check model output before it reaches the user
   */
  checkOutput(text: string): SafetyVerdict {
    return this.run('output', text);
  }

  /**
   * Redact PII. Unaffected by the detection toggles.
   */
  sanitize(text: string): string {
    return sanitize(text);
  }

  /**
   * Append a harmful-content pattern.
   *
   * An invalid regular expression is logged and discarded; this method
   * never throws.
   *
   * @returns whether the pattern was added
   */
  addCustomPattern(pattern: string, category: string = 'custom'): boolean {
    const executionRef = uuidv4();
    let compiled: CompiledPattern<HarmfulPattern>;

    try {
      compiled = compilePattern({
        id: `hc-custom-${this.customPatternCount + 1}`,
        pattern,
        category,
        description: `Custom pattern (${category})`,
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      structuredLog('warn', `Rejected custom pattern for category: ${category}`, {
        execution_ref: executionRef,
        error: errorMessage,
      });
      this.telemetry.emitPatternRejected(executionRef, category, errorMessage);
      return false;
    }

    this.customPatternCount += 1;
    this.harmfulDetector = this.harmfulDetector.withPattern(compiled);

    structuredLog('info', `Added custom pattern for category: ${category}`, {
      execution_ref: executionRef,
      pattern_id: compiled.id,
      harmful_pattern_count: this.harmfulDetector.patternCount,
    });
    this.telemetry.emitPatternAdded(executionRef, category, this.harmfulDetector.patternCount);
    return true;
  }

  /**
   * Snapshot of loaded pattern counts and toggles
   */
  getFilterStats(): FilterStats {
    return {
      harmful_pattern_count: this.harmfulDetector.patternCount,
      jailbreak_pattern_count: this.jailbreakDetector.patternCount,
      content_filter_enabled: this.config.contentFilterEnabled,
      pii_detection_enabled: this.config.piiDetectionEnabled,
      jailbreak_detection_enabled: this.config.jailbreakDetectionEnabled,
    };
  }

  getConfig(): Readonly<EngineConfig> {
    return { ...this.config, allowedCategories: [...this.config.allowedCategories] };
  }

  /**
   * Harmful-content patterns currently loaded, in evaluation order
   */
  listHarmfulPatterns(): HarmfulPattern[] {
    return this.harmfulDetector.listPatterns();
  }

  /**
   * Flush buffered telemetry
   */
  shutdown(): void {
    this.telemetry.shutdown();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private run(direction: Direction, text: string): SafetyVerdict {
    const tracker = new PerformanceTracker();
    const verdict = this.evaluate(direction, text);
    this.record(direction, text, verdict, tracker.getElapsedMs());
    return verdict;
  }

  private evaluate(direction: Direction, text: string): SafetyVerdict {
    if (!text || text.trim() === '') {
      return safeVerdict();
    }

    // Only input is length-limited.
    if (direction === 'input') {
      const length = checkInputLength(text, this.config.maxInputLength);
      if (!length.valid) {
        return inputLimitVerdict(length.limit);
      }
    }

    const harmful = this.harmfulDetector.check(text, direction);
    if (!harmful.is_safe || direction === 'output') {
      return harmful;
    }

    if (this.config.jailbreakDetectionEnabled) {
      const jailbreak = this.jailbreakDetector.check(text);
      if (!jailbreak.is_safe) {
        return jailbreak;
      }
    }

    if (this.config.piiDetectionEnabled) {
      const pii = this.piiDetector.check(text);
      if (!pii.is_safe) {
        return pii;
      }
    }

    return safeVerdict();
  }

  private record(
    direction: Direction,
    text: string,
    verdict: SafetyVerdict,
    durationMs: number
  ): void {
    const executionRef = uuidv4();
    const content = text ?? '';
    const detector = verdict.is_safe ? undefined : verdict.detector;
    const category = verdict.is_safe ? undefined : verdict.category;

    structuredLog('debug', 'Safety check complete', {
      execution_ref: executionRef,
      direction,
      content_length: content.length,
      is_safe: verdict.is_safe,
      confidence: verdict.confidence,
      ...(detector !== undefined && { detector }),
      duration_ms: durationMs,
    });

    if (!this.telemetry.enabled) {
      return;
    }

    this.telemetry.emitCheckComplete(executionRef, {
      direction,
      contentLength: content.length,
      // Hash the content - NEVER emit raw content
      contentHash: createHash('sha256').update(content).digest('hex'),
      durationMs,
      isSafe: verdict.is_safe,
      confidence: verdict.confidence,
      detector,
      category,
    });
  }
}

/**
 * Create engine instance with default configuration
 */
export function createEngine(options?: EngineOptions): ContentSafetyEngine {
  return new ContentSafetyEngine(options);
}
