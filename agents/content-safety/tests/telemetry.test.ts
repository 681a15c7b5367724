/**
 * @module telemetry.test
 * @description Unit tests for telemetry batching
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { TelemetryEmitter, type TelemetryEvent } from '../src/telemetry.js';

const IDENTITY = { engine_id: 'test-engine', engine_version: '0.0.1' };

describe('TelemetryEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop events when disabled', () => {
    const sink = vi.fn();
    const emitter = new TelemetryEmitter(IDENTITY, { sink });

    emitter.emitPatternAdded('ref-1', 'custom', 8);
    emitter.flush();

    expect(emitter.enabled).toBe(false);
    expect(emitter.bufferedCount).toBe(0);
    expect(sink).not.toHaveBeenCalled();
  });

  it('should report whether it is enabled', () => {
    expect(new TelemetryEmitter(IDENTITY, { enabled: true }).enabled).toBe(true);
  });

  it('should buffer until the batch size is reached', () => {
    const batches: TelemetryEvent[][] = [];
    const emitter = new TelemetryEmitter(IDENTITY, {
      enabled: true,
      batchSize: 3,
      sink: (events) => batches.push(events),
    });

    emitter.emitPatternAdded('ref-1', 'custom', 8);
    emitter.emitPatternAdded('ref-2', 'custom', 9);
    expect(emitter.bufferedCount).toBe(2);
    expect(batches).toHaveLength(0);

    emitter.emitPatternRejected('ref-3', 'custom', 'bad pattern');
    expect(emitter.bufferedCount).toBe(0);
    expect(batches).toHaveLength(1);
    expect(batches[0].map((e) => e.execution_ref)).toEqual(['ref-1', 'ref-2', 'ref-3']);
  });

  it('should build events with identity and timestamp', () => {
    const batches: TelemetryEvent[][] = [];
    const emitter = new TelemetryEmitter(IDENTITY, {
      enabled: true,
      sink: (events) => batches.push(events),
    });

    emitter.emitPatternRejected('ref-1', 'custom', 'bad pattern');
    emitter.shutdown();

    const [event] = batches[0];
    expect(event.type).toBe('engine.pattern.rejected');
    expect(event.engine).toEqual(IDENTITY);
    expect(event.execution_ref).toBe('ref-1');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    expect(event.data).toEqual({ category: 'custom', error_message: 'bad pattern' });
  });

  it('should omit absent verdict fields from check events', () => {
    const batches: TelemetryEvent[][] = [];
    const emitter = new TelemetryEmitter(IDENTITY, {
      enabled: true,
      batchSize: 1,
      sink: (events) => batches.push(events),
    });

    emitter.emitCheckComplete('ref-1', {
      direction: 'input',
      contentLength: 4,
      contentHash: 'abc',
      durationMs: 1,
      isSafe: true,
      confidence: 1,
    });

    expect(batches[0][0].data).toEqual({
      direction: 'input',
      content_length: 4,
      content_hash: 'abc',
      duration_ms: 1,
      is_safe: true,
      confidence: 1,
    });
  });

  it('should log and continue when the sink throws', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const emitter = new TelemetryEmitter(IDENTITY, {
      enabled: true,
      sink: () => {
        throw new Error('boom');
      },
    });

    emitter.emitPatternAdded('ref-1', 'custom', 8);

    expect(() => emitter.flush()).not.toThrow();
    expect(emitter.bufferedCount).toBe(0);

    const entry = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'warn',
      component: 'telemetry',
      message: 'Failed to flush telemetry events',
      details: { event_count: 1, error: 'boom' },
    });
  });
});
