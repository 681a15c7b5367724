/**
 * @module safety-check
 * @description Combined input/output safety check
 */

import {
  SafetyCheckRequest,
  type SafetyCheckResult,
  type SafetyVerdict,
} from '../../contracts/index.js';
import { RequestValidationError } from '../../lib/errors.js';
import type { ContentSafetyEngine } from './engine.js';
import { safeVerdict } from './verdict.js';

/**
 * Validate a safety check request
 *
 * @throws RequestValidationError with per-field details
 */
export function validateSafetyCheckRequest(input: unknown): SafetyCheckRequest {
  const result = SafetyCheckRequest.safeParse(input);

  if (!result.success) {
    throw new RequestValidationError(
      result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    );
  }

  return result.data;
}

/**
 * Run the requested directions. A skipped direction reports safe.
 */
export function runSafetyCheck(engine: ContentSafetyEngine, input: unknown): SafetyCheckResult {
  const request = validateSafetyCheckRequest(input);

  const inputCheck: SafetyVerdict =
    request.check_type === 'output' ? safeVerdict() : engine.checkInput(request.text);
  const outputCheck: SafetyVerdict =
    request.check_type === 'input' ? safeVerdict() : engine.checkOutput(request.text);

  return {
    input_check: inputCheck,
    output_check: outputCheck,
    overall_safe: inputCheck.is_safe && outputCheck.is_safe,
  };
}
