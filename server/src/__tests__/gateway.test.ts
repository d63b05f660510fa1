import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { createGatewayApp } from '../routes/mesh.js';
import type { AgentSystem } from '../agents/runtime/agent-system.js';
import { createTestMesh, ScriptedReasoner } from './mesh-fixtures.js';

vi.mock('../lib/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { default: log, createAgentLogger: vi.fn(() => log) };
});

function postJson(app: Hono, path: string, body: unknown) {
  return app.request(`http://test${path}`, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HTTP gateway', () => {
  let system: AgentSystem;
  let reasoner: ScriptedReasoner;
  let app: Hono;

  beforeEach(async () => {
    reasoner = new ScriptedReasoner();
    ({ system } = createTestMesh({ reasoner }));
    await system.createAgent('writer', 'reasoning', { instructions: 'write', activationKeywords: ['topic'] });
    await system.createAgent('out', 'consumer', { sink: 'collect', activationKeywords: ['draft'] });
    system.addConnection('writer', 'out', 'draft');
    app = createGatewayApp(system);
  });

  it('GET /health answers ok', async () => {
    const res = await app.request('http://test/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('GET /topology lists agents and keyword subgraphs', async () => {
    const res = await app.request('http://test/topology');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      keywords: ['draft'],
      subgraphs: [{ keyword: 'draft', agents: ['out', 'writer'], connections: 1 }],
    });
  });

  it('GET /agents/:id describes one agent', async () => {
    const res = await app.request('http://test/agents/writer');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: 'writer',
      kind: 'reasoning',
      state: 'idle',
      activationKeywords: ['topic'],
      outputConnections: [{ keyword: 'draft', destinations: ['out'] }],
      cache: { size: 0, unused: 0 },
    });
  });

  it('GET /agents/:id answers 404 for an unknown agent', async () => {
    const res = await app.request('http://test/agents/ghost');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Agent not found' });
  });

  it('POST /agents/:id/messages injects into the cache and activates the agent', async () => {
    const res = await postJson(app, '/agents/writer/messages', { keyword: 'topic', payload: 'owls' });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ delivered: true });
    await system.whenIdle();
    expect(reasoner.calls.map((c) => c.messages)).toEqual([[{ sender: 'http', keyword: 'topic', payload: 'owls' }]]);
  });

  it('keeps a sender given in the body', async () => {
    await postJson(app, '/agents/writer/messages', { keyword: 'note', payload: 'fyi', sender: 'cron' });

    expect(system.getAgent('writer')?.cache.list().map((e) => [e.sender, e.keyword])).toEqual([['cron', 'note']]);
  });

  it('rejects an invalid message body with 400', async () => {
    const res = await postJson(app, '/agents/writer/messages', { keyword: '', payload: 'x' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request',
      details: expect.stringContaining('keyword'),
    });
    expect(system.getAgent('writer')?.cache.size).toBe(0);
  });

  it('answers 404 when injecting into an unknown agent', async () => {
    const res = await postJson(app, '/agents/ghost/messages', { keyword: 'topic', payload: 'x' });
    expect(res.status).toBe(404);
  });

  it('answers 403 when injection is disabled', async () => {
    const readOnly = createGatewayApp(system, { injectEnabled: false });
    const res = await postJson(readOnly, '/agents/writer/messages', { keyword: 'topic', payload: 'x' });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'Message injection is disabled' });
  });

  it('POST /agents/:id/trigger runs the agent with no new input', async () => {
    const res = await app.request('http://test/agents/writer/trigger', { method: 'POST' });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ triggered: true });
    await system.whenIdle();
    expect(reasoner.calls.map((c) => c.messages)).toEqual([[]]);

    const missing = await app.request('http://test/agents/ghost/trigger', { method: 'POST' });
    expect(missing.status).toBe(404);
  });

  it('GET /failures reports totals and filters by kind', async () => {
    system.inject('ghost', 'topic', 'lost');

    const res = await app.request('http://test/failures?kind=delivery-miss');
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      totals: { 'delivery-miss': 1, 'poison-skip': 0 },
      events: [{ kind: 'delivery-miss', agentId: 'ghost', keyword: 'topic' }],
    });

    const bad = await app.request('http://test/failures?kind=bogus');
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({ error: 'Unknown failure kind: bogus' });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await app.request('http://test/nowhere');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
