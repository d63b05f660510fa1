/**
 * Agent Kind Registry — named factories that turn a configuration record into
 * an AgentDefinition.
 *
 * Kinds are registered explicitly at startup and looked up by name. Each kind
 * carries a zod schema, so a configuration that arrives as JSON (HTTP gateway,
 * agent-creator sink, checkpoint restore) is validated before the factory
 * ever sees it.
 */

import type { z } from 'zod';
import type { AgentDefinition } from './agent-protocol.js';
import { AgentMeshError } from './failures.js';
import { formatIssues } from '../../lib/validate.js';

interface KindEntry {
  kind: string;
  description: string;
  build: (config: unknown) => AgentDefinition;
}

export interface KindDescription {
  kind: string;
  description: string;
}

export class AgentKindRegistry {
  private readonly kinds = new Map<string, KindEntry>();

  /** Register a kind. Registering the same name twice is an error. */
  register<TSchema extends z.ZodTypeAny>(
    kind: string,
    schema: TSchema,
    factory: (config: z.infer<TSchema>) => AgentDefinition,
    description = '',
  ): void {
    if (this.kinds.has(kind)) {
      throw new AgentMeshError('invalid-config', `Agent kind already registered: ${kind}`);
    }
    this.kinds.set(kind, {
      kind,
      description,
      build: (config) => {
        const parsed = schema.safeParse(config);
        if (!parsed.success) {
          throw new AgentMeshError(
            'invalid-config',
            `Invalid config for kind '${kind}': ${formatIssues(parsed.error.issues)}`,
          );
        }
        return factory(parsed.data);
      },
    });
  }

  /** Build a definition for `kind`. Throws on an unknown kind or invalid config. */
  create(kind: string, config: unknown): AgentDefinition {
    const entry = this.kinds.get(kind);
    if (!entry) {
      throw new AgentMeshError('unknown-kind', `Unknown agent kind: ${kind}`);
    }
    return entry.build(config);
  }

  has(kind: string): boolean {
    return this.kinds.has(kind);
  }

  list(): KindDescription[] {
    return [...this.kinds.values()].map(({ kind, description }) => ({ kind, description }));
  }

  /** Number of registered kinds. */
  get size(): number {
    return this.kinds.size;
  }
}
