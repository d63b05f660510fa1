import { describe, it, expect, vi } from 'vitest';
import type { ReasoningRequest } from '../agents/runtime/agent-protocol.js';
import { buildPrompt } from '../agents/reasoning/prompt.js';
import { CompletionReasoner } from '../agents/reasoning/completion-reasoner.js';
import { createAnthropicCompletion, extractResponseText, type MessagesClient } from '../lib/anthropic.js';
import { TimeoutError } from '../lib/abort.js';
import logger from '../lib/logger.js';

vi.mock('../lib/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { default: log, createAgentLogger: vi.fn(() => log) };
});

const request: ReasoningRequest = {
  agentId: 'summariser',
  instructions: 'Summarise what you read.',
  selfState: 'draft 1',
  outputKeywords: ['summary', 'log'],
  messages: [
    { sender: 'reader', keyword: 'text', payload: 'hello' },
    { sender: 'reader', keyword: 'text', payload: 'world' },
  ],
};

describe('buildPrompt', () => {
  it('lays out instructions, self-state and output keywords before the directive guide', () => {
    const { system, user } = buildPrompt(request);

    expect(system.split('\n\n').slice(0, 3)).toEqual([
      'Summarise what you read.',
      '<self_state>draft 1</self_state>',
      '<output_keywords>summary, log</output_keywords>',
    ]);
    expect(system).toContain('<keyword to="agent_id">payload</keyword>');
    expect(user).toBe('text : hello\ntext : world');
  });

  it('marks empty keyword and message lists', () => {
    const { system, user } = buildPrompt({ ...request, outputKeywords: [], messages: [] });

    expect(system).toContain('<output_keywords>(none)</output_keywords>');
    expect(user).toBe('(no new messages)');
  });
});

describe('CompletionReasoner', () => {
  const signal = new AbortController().signal;

  it('parses the completion into directives', async () => {
    const complete = vi.fn(async () => 'ok <summary>two words</summary><self_state>done</self_state>');
    const reasoner = new CompletionReasoner(complete);

    const result = await reasoner.invoke(request, signal);

    expect(result).toEqual({
      ok: true,
      directives: [
        { kind: 'message', keyword: 'summary', payload: 'two words' },
        { kind: 'state', state: 'done' },
      ],
    });
    expect(complete).toHaveBeenCalledWith(buildPrompt(request), signal, { agentId: 'summariser' });
  });

  it('treats an empty reply as success with no directives', async () => {
    const result = await new CompletionReasoner(async () => '').invoke(request, signal);
    expect(result).toEqual({ ok: true, directives: [] });
  });

  it('reports an unparseable signal block as malformed output', async () => {
    const result = await new CompletionReasoner(async () => '<signal>not json</signal>').invoke(request, signal);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.failure).toBe('malformed-output');
  });

  it('maps a deadline to a timeout and anything else to a transport error', async () => {
    const timedOut = await new CompletionReasoner(async () => {
      throw new TimeoutError(50);
    }).invoke(request, signal);
    expect(timedOut).toEqual({ ok: false, failure: 'timeout', message: 'Timed out after 50ms' });

    const broken = await new CompletionReasoner(async () => {
      throw new Error('connection refused');
    }).invoke(request, signal);
    expect(broken).toEqual({ ok: false, failure: 'transport-error', message: 'connection refused' });
  });
});

describe('createAnthropicCompletion', () => {
  function fakeClient(replies: Array<() => Promise<{ content: Array<{ type: string; text?: string }> }>>) {
    let call = 0;
    const create = vi.fn(() => {
      const reply = replies[Math.min(call, replies.length - 1)];
      call += 1;
      return reply ? reply() : Promise.reject(new Error('no reply scripted'));
    });
    const client: MessagesClient = { messages: { create } };
    return { client, create };
  }

  it('sends the prompt and joins the text blocks of the reply', async () => {
    const { client, create } = fakeClient([
      async () => ({ content: [{ type: 'text', text: '<a>1</a>' }, { type: 'tool_use' }, { type: 'text', text: '<b>2</b>' }] }),
    ]);
    const complete = createAnthropicCompletion({ model: 'test-model', maxTokens: 100, client });
    const controller = new AbortController();

    const text = await complete({ system: 'sys', user: 'usr' }, controller.signal, { agentId: 'writer' });

    expect(text).toBe('<a>1</a><b>2</b>');
    expect(create).toHaveBeenCalledWith(
      { model: 'test-model', max_tokens: 100, system: 'sys', messages: [{ role: 'user', content: 'usr' }] },
      { signal: controller.signal },
    );
  });

  it('retries a transient failure', async () => {
    const { client, create } = fakeClient([
      async () => {
        throw Object.assign(new Error('overloaded'), { status: 529 });
      },
      async () => ({ content: [{ type: 'text', text: 'fine' }] }),
    ]);
    const complete = createAnthropicCompletion({ model: 'm', maxTokens: 10, baseDelay: 1, client });

    expect(await complete({ system: '', user: '' }, new AbortController().signal, { agentId: 'writer' })).toBe('fine');
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('logs each call with its agent, model, duration and sizes', async () => {
    vi.mocked(logger.info).mockClear();
    const { client } = fakeClient([async () => ({ content: [{ type: 'text', text: 'abcd' }] })]);
    const complete = createAnthropicCompletion({ model: 'test-model', maxTokens: 10, client });

    await complete({ system: 'sys', user: 'usr' }, new AbortController().signal, { agentId: 'writer' });

    expect(logger.info).toHaveBeenCalledWith(
      { agentId: 'writer', model: 'test-model', durationMs: expect.any(Number), promptChars: 6, outputChars: 4 },
      'Anthropic: completion',
    );
  });

  it('logs and rethrows a call that fails for good', async () => {
    vi.mocked(logger.warn).mockClear();
    const { client } = fakeClient([
      async () => {
        throw new Error('bad request');
      },
    ]);
    const complete = createAnthropicCompletion({ model: 'test-model', maxTokens: 10, client });

    await expect(
      complete({ system: 's', user: 'u' }, new AbortController().signal, { agentId: 'writer' }),
    ).rejects.toThrow('bad request');
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ agentId: 'writer', model: 'test-model', err: 'bad request' }),
      'Anthropic: completion failed',
    );
  });

  it('extracts nothing from a reply without text blocks', () => {
    expect(extractResponseText({ content: [{ type: 'tool_use' }] })).toBe('');
  });
});
