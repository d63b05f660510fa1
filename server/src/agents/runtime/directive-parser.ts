/**
 * Parses completion text into directives.
 *
 *   <keyword>payload</keyword>             message on `keyword`
 *   <keyword to="agent-b">payload</keyword> message with a destination hint
 *   <self_state>text</self_state>          replaces the agent's self-state
 *   <signal>[{"type":"SEEK",...}]</signal>  routing signals (JSON array)
 *
 * Text outside tags is ignored. A signal block that is not a valid JSON array
 * of known signals makes the whole output malformed, so none of it is applied.
 */

import { z } from 'zod';
import type { Directive, RoutingSignal } from './agent-protocol.js';
import { formatIssues } from '../../lib/validate.js';

const TAG_RE = /<([A-Za-z_][\w-]*)(?:\s+to="([^"]*)")?\s*>([\s\S]*?)<\/\1\s*>/g;

export const SELF_STATE_TAG = 'self_state';
export const SIGNAL_TAG = 'signal';

const keyword = z.string().trim().min(1);

const RoutingSignalSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('EXPLORE'), keyword }),
  z.object({ type: z.literal('STOP_EXPLORE'), keyword }),
  z.object({ type: z.literal('SEEK'), keyword, target: z.string().min(1).optional() }),
  z.object({ type: z.literal('ACCEPT_INPUT'), id: z.string().min(1), keyword }),
  z.object({ type: z.literal('REJECT_INPUT'), keyword }),
]);

const SignalBlockSchema = z.union([
  z.array(RoutingSignalSchema),
  RoutingSignalSchema.transform((signal) => [signal]),
]);

export type ParseResult =
  | { ok: true; directives: Directive[] }
  | { ok: false; message: string };

export function parseSignals(raw: string): { ok: true; signals: RoutingSignal[] } | { ok: false; message: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, message: `signal block is not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = SignalBlockSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, message: `invalid signal: ${formatIssues(parsed.error.issues)}` };
  }
  return { ok: true, signals: parsed.data };
}

export function parseDirectives(text: string): ParseResult {
  const directives: Directive[] = [];

  for (const match of text.matchAll(TAG_RE)) {
    const tag = match[1] ?? '';
    const hint = match[2]?.trim();
    const body = (match[3] ?? '').trim();

    if (tag === SELF_STATE_TAG) {
      directives.push({ kind: 'state', state: body });
      continue;
    }

    if (tag === SIGNAL_TAG) {
      const signals = parseSignals(body);
      if (!signals.ok) return signals;
      for (const signal of signals.signals) {
        directives.push({ kind: 'signal', signal });
      }
      continue;
    }

    directives.push({
      kind: 'message',
      keyword: tag,
      payload: body,
      ...(hint ? { destinationHint: hint } : {}),
    });
  }

  return { ok: true, directives };
}
