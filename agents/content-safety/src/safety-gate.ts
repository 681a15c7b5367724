/**
 * @module safety-gate
 * @description Enforcement wrapper for an inference layer
 *
 * Screens prompts and chat messages before a model call and completions
 * after it. With the content filter disabled every guard allows without
 * running the engine.
 */

import type { SafetyVerdict, UnsafeVerdict } from '../../contracts/index.js';
import type { ContentSafetyEngine } from './engine.js';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool' | 'function';

export interface ChatMessage {
  role: ChatRole;
  content: string | null;
}

export type GateError = 'Content filtered' | 'Output filtered';

export type GateOutcome =
  | { allowed: true }
  | {
      allowed: false;
      error: GateError;
      filter_reason: string;
      verdict: UnsafeVerdict;
    };

const ALLOWED: GateOutcome = { allowed: true };

function outcome(verdict: SafetyVerdict, error: GateError): GateOutcome {
  if (verdict.is_safe) {
    return ALLOWED;
  }
  return {
    allowed: false,
    error,
    filter_reason: verdict.reason,
    verdict,
  };
}

export class SafetyGate {
  private readonly engine: ContentSafetyEngine;

  constructor(engine: ContentSafetyEngine) {
    this.engine = engine;
  }

  get enabled(): boolean {
    return this.engine.getConfig().contentFilterEnabled;
  }

  /**
   * Screen a completion prompt
   */
  guardPrompt(prompt: string): GateOutcome {
    if (!this.enabled) return ALLOWED;
    return outcome(this.engine.checkInput(prompt), 'Content filtered');
  }

  /**
   * Screen the user messages of a chat request, in order.
   * System, assistant and tool messages are not checked.
   */
  guardChatMessages(messages: readonly ChatMessage[]): GateOutcome {
    if (!this.enabled) return ALLOWED;

    for (const message of messages) {
      if (message.role !== 'user') continue;

      const result = outcome(this.engine.checkInput(message.content ?? ''), 'Content filtered');
      if (!result.allowed) {
        return result;
      }
    }
    return ALLOWED;
  }

  /**
   * Screen model output. An empty completion is allowed unchecked.
   */
  guardCompletion(completion: string | null): GateOutcome {
    if (!this.enabled || !completion) return ALLOWED;
    return outcome(this.engine.checkOutput(completion), 'Output filtered');
  }
}
