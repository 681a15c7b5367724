/**
 * @module telemetry
 * @description Telemetry emission for content safety checks
 *
 * Every check and every pattern change can emit an event.
 * Telemetry NEVER contains raw content: only lengths, hashes and verdict
 * metadata.
 */

import type { Direction, DetectorKind } from '../../contracts/index.js';
import { structuredLog } from '../../lib/structured-log.js';

/**
 * Telemetry event types
 */
export type TelemetryEventType =
  | 'engine.check.complete'
  | 'engine.pattern.added'
  | 'engine.pattern.rejected';

export interface EngineIdentity {
  engine_id: string;
  engine_version: string;
}

/**
 * Base telemetry event
 */
export interface TelemetryEvent {
  type: TelemetryEventType;
  engine: EngineIdentity;
  execution_ref: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export type TelemetrySink = (events: TelemetryEvent[]) => void;

/**
 * Telemetry configuration
 */
export interface TelemetryConfig {
  /** Enable telemetry emission */
  enabled: boolean;
  /** Flush once this many events are buffered */
  batchSize: number;
  /** Receives each flushed batch */
  sink: TelemetrySink;
}

const logSink: TelemetrySink = (events) => {
  structuredLog('debug', 'Telemetry batch', { events }, 'telemetry');
};

const DEFAULT_CONFIG: TelemetryConfig = {
  enabled: false,
  batchSize: 10,
  sink: logSink,
};

export interface CheckCompleteData {
  direction: Direction;
  contentLength: number;
  contentHash: string;
  durationMs: number;
  isSafe: boolean;
  confidence: number;
  detector?: DetectorKind;
  category?: string;
}

/**
 * Telemetry emitter. Buffers events and hands them to the sink in batches.
 */
export class TelemetryEmitter {
  private readonly config: TelemetryConfig;
  private readonly engine: EngineIdentity;
  private readonly buffer: TelemetryEvent[] = [];

  constructor(engine: EngineIdentity, config: Partial<TelemetryConfig> = {}) {
    this.engine = engine;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Emit check completion event
   */
  emitCheckComplete(executionRef: string, data: CheckCompleteData): void {
    this.emit('engine.check.complete', executionRef, {
      direction: data.direction,
      content_length: data.contentLength,
      content_hash: data.contentHash,
      duration_ms: data.durationMs,
      is_safe: data.isSafe,
      confidence: data.confidence,
      ...(data.detector !== undefined && { detector: data.detector }),
      ...(data.category !== undefined && { category: data.category }),
    });
  }

  emitPatternAdded(executionRef: string, category: string, patternCount: number): void {
    this.emit('engine.pattern.added', executionRef, {
      category,
      harmful_pattern_count: patternCount,
    });
  }

  emitPatternRejected(executionRef: string, category: string, errorMessage: string): void {
    this.emit('engine.pattern.rejected', executionRef, {
      category,
      error_message: errorMessage,
    });
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get bufferedCount(): number {
    return this.buffer.length;
  }

  /**
   * Force flush all buffered events
   */
  flush(): void {
    if (!this.config.enabled || this.buffer.length === 0) return;

    const events = [...this.buffer];
    this.buffer.length = 0;

    try {
      this.config.sink(events);
    } catch (error) {
      // Telemetry failures are non-fatal
      structuredLog('warn', 'Failed to flush telemetry events', {
        event_count: events.length,
        error: error instanceof Error ? error.message : String(error),
      }, 'telemetry');
    }
  }

  /**
   * Shutdown the emitter
   */
  shutdown(): void {
    this.flush();
  }

  private emit(type: TelemetryEventType, executionRef: string, data: Record<string, unknown>): void {
    if (!this.config.enabled) return;

    this.buffer.push({
      type,
      engine: this.engine,
      execution_ref: executionRef,
      timestamp: new Date().toISOString(),
      data,
    });

    if (this.buffer.length >= this.config.batchSize) {
      this.flush();
    }
  }
}
