/**
 * @module safety-check.test
 * @description Unit tests for the combined safety check
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ContentSafetyEngine, createEngine } from '../src/engine.js';
import { runSafetyCheck, validateSafetyCheckRequest } from '../src/safety-check.js';
import { RequestValidationError } from '../../lib/errors.js';

const SAFE = { is_safe: true, reason: null, confidence: 1 };

describe('runSafetyCheck', () => {
  let engine: ContentSafetyEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  it('should check both directions by default', () => {
    expect(runSafetyCheck(engine, { text: 'hello' })).toEqual({
      input_check: SAFE,
      output_check: SAFE,
      overall_safe: true,
    });
  });

  it('should skip the output check for input requests', () => {
    const result = runSafetyCheck(engine, { text: 'email me at a@b.com', check_type: 'input' });

    expect(result.input_check).toMatchObject({ is_safe: false, detector: 'pii' });
    expect(result.output_check).toEqual(SAFE);
    expect(result.overall_safe).toBe(false);
  });

  it('should skip the input check for output requests', () => {
    const result = runSafetyCheck(engine, { text: 'email me at a@b.com', check_type: 'output' });

    expect(result).toEqual({ input_check: SAFE, output_check: SAFE, overall_safe: true });
  });

  it('should be unsafe when either direction is unsafe', () => {
    const result = runSafetyCheck(engine, { text: 'As an AI language model' });

    expect(result.input_check).toEqual(SAFE);
    expect(result.output_check).toMatchObject({ detector: 'system_prompt_leakage' });
    expect(result.overall_safe).toBe(false);
  });
});

describe('validateSafetyCheckRequest', () => {
  it('should apply the default check type', () => {
    expect(validateSafetyCheckRequest({ text: 'hi' })).toEqual({ text: 'hi', check_type: 'both' });
  });

  it('should report field paths', () => {
    try {
      validateSafetyCheckRequest({ text: 42, check_type: 'sideways' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RequestValidationError);
      if (error instanceof RequestValidationError) {
        expect(error.code).toBe('VALIDATION_FAILED');
        expect(error.errors.map((e) => e.path)).toEqual(['text', 'check_type']);
      }
    }
  });

  it('should label root errors', () => {
    expect(() => validateSafetyCheckRequest(null)).toThrow(/^Input validation failed: \(root\): /);
  });
});
