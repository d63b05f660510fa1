import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AgentKindRegistry } from '../agents/runtime/agent-registry.js';
import { AgentMeshError } from '../agents/runtime/failures.js';
import { registerBuiltinKinds } from '../agents/kinds.js';
import { CollectingSink } from '../agents/sinks/consumer-sink.js';

const EchoConfig = z.object({ word: z.string().default('hi') }).strict();

function echoRegistry() {
  const kinds = new AgentKindRegistry();
  kinds.register(
    'echo',
    EchoConfig,
    (config) => ({
      instructions: `say ${config.word}`,
      activationKeywords: [config.word],
      capabilities: { canProduce: false, canConsume: false },
    }),
    'Says one word',
  );
  return kinds;
}

describe('AgentKindRegistry', () => {
  it('builds a definition from a validated config', () => {
    const kinds = echoRegistry();

    expect(kinds.create('echo', {})).toMatchObject({ instructions: 'say hi', activationKeywords: ['hi'] });
    expect(kinds.create('echo', { word: 'yo' }).instructions).toBe('say yo');
    expect(kinds.list()).toEqual([{ kind: 'echo', description: 'Says one word' }]);
    expect(kinds.has('echo')).toBe(true);
    expect(kinds.size).toBe(1);
  });

  it('refuses to register a name twice', () => {
    const kinds = echoRegistry();
    expect(() => kinds.register('echo', EchoConfig, () => kinds.create('echo', {}))).toThrow(
      'Agent kind already registered: echo',
    );
  });

  it('rejects unknown kinds and invalid configs with coded errors', () => {
    const kinds = echoRegistry();

    expect(() => kinds.create('shout', {})).toThrow(AgentMeshError);
    expect(() => kinds.create('echo', { word: 3 })).toThrow("Invalid config for kind 'echo': word: Expected string, received number");
    expect(() => kinds.create('echo', { word: 'a', extra: true })).toThrow(/Unrecognized key/);
  });
});

describe('registerBuiltinKinds', () => {
  const kinds = new AgentKindRegistry();
  registerBuiltinKinds(kinds, new Map([['collect', new CollectingSink()]]));

  it('registers reasoning, consumer and producer', () => {
    expect(kinds.list().map((k) => k.kind)).toEqual(['reasoning', 'consumer', 'producer']);
  });

  it('gives each kind its capability flags', () => {
    expect(kinds.create('reasoning', { instructions: 'think' }).capabilities).toEqual({ canProduce: false, canConsume: false });
    expect(kinds.create('consumer', { sink: 'collect', activationKeywords: ['k'] }).capabilities).toEqual({
      canProduce: false,
      canConsume: true,
    });
    const producer = kinds.create('producer', {});
    expect(producer.capabilities).toEqual({ canProduce: true, canConsume: false });
    expect(producer.activationKeywords).toEqual([]);
  });

  it('requires at least one activation keyword for a consumer', () => {
    expect(() => kinds.create('consumer', { sink: 'collect', activationKeywords: [] })).toThrow(AgentMeshError);
  });
});
