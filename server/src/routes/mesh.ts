/**
 * HTTP gateway — the producer role and read-only inspection over Hono.
 *
 *   GET  /health                 liveness
 *   GET  /topology               describeSystem()
 *   GET  /agents/:id             describeAgent(id)
 *   POST /agents/:id/messages    inject { keyword, payload, sender? }
 *   POST /agents/:id/trigger     explicit trigger
 *   GET  /failures               recent failure events (?kind= filter)
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { AgentSystem } from '../agents/runtime/agent-system.js';
import { FAILURE_KINDS, type FailureKind } from '../agents/runtime/failures.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import logger from '../lib/logger.js';
import { formatIssues, validateBody } from '../lib/validate.js';

const MAX_MESSAGE_BODY_BYTES = 256_000;

const injectSchema = z.object({
  keyword: z.string().min(1).max(200),
  payload: z.string().max(200_000),
  sender: z.string().min(1).max(200).optional(),
});

export interface GatewayOptions {
  /** When false, POST /agents/:id/messages answers 403 */
  injectEnabled?: boolean;
}

function isFailureKind(value: string): value is FailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

export function createGatewayApp(system: AgentSystem, options: GatewayOptions = {}): Hono {
  const injectEnabled = options.injectEnabled ?? true;
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.get('/topology', (c) => c.json(system.describeSystem()));

  app.get('/agents/:id', (c) => {
    const description = system.describeAgent(c.req.param('id'));
    if (!description) return c.json({ error: 'Agent not found' }, 404);
    return c.json(description);
  });

  app.post('/agents/:id/messages', async (c) => {
    if (!injectEnabled) return c.json({ error: 'Message injection is disabled' }, 403);

    const agentId = c.req.param('id');
    if (!system.getAgent(agentId)) return c.json({ error: 'Agent not found' }, 404);

    const body = await parseJsonBodyWithLimit(c, MAX_MESSAGE_BODY_BYTES);
    if (!body.ok) return body.response;

    const parsed = validateBody(injectSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }

    const { keyword, payload, sender } = parsed.data;
    const delivered = system.inject(agentId, keyword, payload, sender ?? 'http');
    logger.debug({ agentId, keyword, delivered }, 'Gateway: message injected');
    return c.json({ delivered }, 202);
  });

  app.post('/agents/:id/trigger', (c) => {
    const agentId = c.req.param('id');
    if (!system.trigger(agentId)) return c.json({ error: 'Agent not found' }, 404);
    return c.json({ triggered: true }, 202);
  });

  app.get('/failures', (c) => {
    const kind = c.req.query('kind');
    if (kind !== undefined && !isFailureKind(kind)) {
      return c.json({ error: `Unknown failure kind: ${kind}` }, 400);
    }
    return c.json({
      totals: system.failures.totals(),
      events: system.failures.list(kind),
    });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path, method: c.req.method }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
