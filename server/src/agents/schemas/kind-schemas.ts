/**
 * Zod schemas for agent kind configuration records and agent-creator
 * operations.
 *
 * Configurations arrive as JSON from the gateway, the agent-creator sink and
 * checkpoint files, so every field is checked before a factory runs.
 * Objects are strict: a misspelled key is an error, not a silent default.
 */

import { z } from 'zod';

const KeywordSchema = z.string().min(1);

export const CacheSettingsSchema = z.object({
  capacity: z.number().int().positive().optional(),
  dedup: z.boolean().optional(),
}).strict();

// ─── reasoning ────────────────────────────────────────────────────────

export const ReasoningKindConfigSchema = z.object({
  instructions: z.string().min(1),
  activationKeywords: z.array(KeywordSchema).default([]),
  selfState: z.string().optional(),
  cache: CacheSettingsSchema.optional(),
}).strict();

export type ReasoningKindConfig = z.infer<typeof ReasoningKindConfigSchema>;

// ─── consumer ─────────────────────────────────────────────────────────

export const ConsumerKindConfigSchema = z.object({
  /** Name of a registered sink */
  sink: z.string().min(1),
  activationKeywords: z.array(KeywordSchema).min(1),
  instructions: z.string().default(''),
  cache: CacheSettingsSchema.optional(),
}).strict();

export type ConsumerKindConfig = z.infer<typeof ConsumerKindConfigSchema>;

// ─── producer ─────────────────────────────────────────────────────────

export const ProducerKindConfigSchema = z.object({
  cache: CacheSettingsSchema.optional(),
}).strict();

export type ProducerKindConfig = z.infer<typeof ProducerKindConfigSchema>;

// ─── agent-creator operations ─────────────────────────────────────────

export const CreateAgentOperationSchema = z.object({
  op: z.literal('create_agent'),
  id: z.string().min(1),
  kind: z.string().min(1),
  config: z.unknown().optional(),
});

export const ConnectAgentsOperationSchema = z.object({
  op: z.literal('connect_agents'),
  source: z.string().min(1),
  destination: z.string().min(1),
  keyword: KeywordSchema,
});

export const SetActivationOperationSchema = z.object({
  op: z.literal('set_activation'),
  id: z.string().min(1),
  keywords: z.array(KeywordSchema),
});

export const AgentCreatorOperationSchema = z.discriminatedUnion('op', [
  CreateAgentOperationSchema,
  ConnectAgentsOperationSchema,
  SetActivationOperationSchema,
]);

export type AgentCreatorOperation = z.infer<typeof AgentCreatorOperationSchema>;

/** A payload carries one operation or a list of them. */
export const AgentCreatorPayloadSchema = z.union([
  AgentCreatorOperationSchema.transform((op) => [op]),
  z.array(AgentCreatorOperationSchema),
]);
