/**
 * Prompt layout for text-completion reasoners.
 *
 * System part: the agent's instruction text, its self-state and the keywords
 * it can currently publish on, followed by the directive format.
 * User part: one `keyword : payload` line per unused message, oldest first.
 */

import type { ReasoningRequest } from '../runtime/agent-protocol.js';
import { SELF_STATE_TAG, SIGNAL_TAG } from '../runtime/directive-parser.js';

export interface CompletionPrompt {
  system: string;
  user: string;
}

const DIRECTIVE_GUIDE = `Reply only with tagged blocks:
- <keyword>payload</keyword> publishes payload on one of your output keywords
- <keyword to="agent_id">payload</keyword> publishes to that connected agent only
- <${SELF_STATE_TAG}>text</${SELF_STATE_TAG}> replaces your self-state
- <${SIGNAL_TAG}>[{"type":"EXPLORE","keyword":"..."}]</${SIGNAL_TAG}> sends routing signals (EXPLORE, STOP_EXPLORE, SEEK, ACCEPT_INPUT, REJECT_INPUT)`;

export function buildPrompt(request: ReasoningRequest): CompletionPrompt {
  const keywords = request.outputKeywords.length > 0 ? request.outputKeywords.join(', ') : '(none)';
  const system = [
    request.instructions,
    `<${SELF_STATE_TAG}>${request.selfState}</${SELF_STATE_TAG}>`,
    `<output_keywords>${keywords}</output_keywords>`,
    DIRECTIVE_GUIDE,
  ].join('\n\n');

  const user = request.messages.length > 0
    ? request.messages.map((m) => `${m.keyword} : ${m.payload}`).join('\n')
    : '(no new messages)';

  return { system, user };
}
