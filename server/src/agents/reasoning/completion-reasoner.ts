/**
 * Reasoner backed by a text-completion function.
 *
 * The completion function owns transport concerns (client, retries, model).
 * This adapter builds the prompt, parses the reply into directives and maps
 * every outcome onto a ReasoningResult; it never throws.
 */

import type { Reasoner, ReasoningRequest, ReasoningResult } from '../runtime/agent-protocol.js';
import { parseDirectives } from '../runtime/directive-parser.js';
import { buildPrompt, type CompletionPrompt } from './prompt.js';
import { TimeoutError } from '../../lib/abort.js';

/** Who a completion is for; carried into the transport's log lines. */
export interface CompletionContext {
  agentId: string;
}

export type TextCompletion = (
  prompt: CompletionPrompt,
  signal: AbortSignal,
  context: CompletionContext,
) => Promise<string>;

export class CompletionReasoner implements Reasoner {
  constructor(private readonly complete: TextCompletion) {}

  async invoke(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResult> {
    let text: string;
    try {
      text = await this.complete(buildPrompt(request), signal, { agentId: request.agentId });
    } catch (err) {
      if (err instanceof TimeoutError || (signal.aborted && signal.reason instanceof TimeoutError)) {
        return { ok: false, failure: 'timeout', message: err instanceof Error ? err.message : String(err) };
      }
      return {
        ok: false,
        failure: 'transport-error',
        message: err instanceof Error ? err.message : String(err),
      };
    }

    const parsed = parseDirectives(text);
    if (!parsed.ok) {
      return { ok: false, failure: 'malformed-output', message: parsed.message };
    }
    return { ok: true, directives: parsed.directives };
  }
}
