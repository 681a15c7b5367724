/**
 * @module program.test
 * @description Command-level tests for the content-safety CLI
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setLogLevel, setLogWriter } from '../../../agents/lib/index.js';
import { createProgram } from '../src/program.js';

const SAFE = { is_safe: true, reason: null, confidence: 1 };

function stdout(): string {
  return vi
    .mocked(console.log)
    .mock.calls.map((call) => call.map(String).join(' '))
    .join('\n');
}

function stderrEntries(): Array<{ level: string; message: string }> {
  return vi
    .mocked(console.error)
    .mock.calls.map((call) => String(call[0]))
    .filter((line) => line.startsWith('{'))
    .map((line) => JSON.parse(line));
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('content-safety CLI', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('LOG_LEVEL', 'info');
    vi.stubEnv('CONTENT_FILTER_ENABLED', '');
    vi.stubEnv('PII_DETECTION_ENABLED', '');
    vi.stubEnv('JAILBREAK_DETECTION_ENABLED', '');
    vi.stubEnv('SAFETY_MAX_INPUT_LENGTH', '');
    vi.stubEnv('TELEMETRY_ENABLED', '');
  });

  afterEach(() => {
    setLogWriter((line) => console.log(line));
    setLogLevel('info');
    process.exitCode = undefined;
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('check -o json', () => {
    it('should keep stdout parseable when a custom pattern is logged', async () => {
      await run('check', 'hello world', '--custom-pattern', 'zebra', '-o', 'json');

      expect(JSON.parse(stdout())).toEqual({
        input_check: SAFE,
        output_check: SAFE,
        overall_safe: true,
      });
      expect(stderrEntries().map((e) => e.message)).toContain(
        'Added custom pattern for category: custom'
      );
      expect(process.exitCode).toBe(0);
    });

    it('should keep stdout parseable with debug logging', async () => {
      vi.stubEnv('LOG_LEVEL', 'debug');

      await run('check', 'bomb instructions', '-o', 'json');

      const result = JSON.parse(stdout());
      expect(result.overall_safe).toBe(false);
      expect(result.input_check.detector).toBe('harmful_content');
      expect(stderrEntries().filter((e) => e.message === 'Safety check complete')).toHaveLength(2);
      expect(process.exitCode).toBe(1);
    });

    it('should honour --no-pii', async () => {
      await run('--no-pii', 'check', 'a@b.com', '-d', 'input', '-o', 'json');

      expect(JSON.parse(stdout()).overall_safe).toBe(true);
    });
  });

  describe('sanitize -o json', () => {
    it('should print the redacted text', async () => {
      await run('sanitize', 'call 555-123-4567', '-o', 'json');

      expect(JSON.parse(stdout())).toEqual({ sanitized: 'call [PHONE]', changed: true });
    });
  });

  describe('stats -o json', () => {
    it('should print filter statistics', async () => {
      await run('stats', '-o', 'json');

      expect(JSON.parse(stdout())).toEqual({
        harmful_pattern_count: 7,
        jailbreak_pattern_count: 10,
        content_filter_enabled: true,
        pii_detection_enabled: true,
        jailbreak_detection_enabled: true,
      });
    });
  });
});
