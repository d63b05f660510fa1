/**
 * Agent Protocol — Shared types for the agent mesh.
 *
 * Defines cached messages, the lifecycle states of an agent, the directives a
 * reasoning step can emit, the reasoning collaborator interface, and the
 * definition record an agent kind factory produces.
 *
 * This module has no runtime dependencies. Everything that routes, caches or
 * schedules imports its vocabulary from here.
 */

export type AgentId = string;

// ─── Messages ────────────────────────────────────────────────────────

/** What a sender hands to the bus for one destination. */
export interface InboundMessage {
  sender: AgentId;
  keyword: string;
  payload: string;
}

/** One entry in an agent's message cache. */
export interface CachedMessage extends Readonly<InboundMessage> {
  /** Monotonically increasing per cache; defines arrival order */
  readonly sequence: number;
  /** Set once by the activation that consumed the entry, never reset */
  readonly used: boolean;
  readonly receivedAt: string;
}

// ─── Lifecycle ───────────────────────────────────────────────────────

export type AgentLifecycleState = 'idle' | 'triggered' | 'processing' | 'removed';

/** Role flags. Producers inject into the mesh, consumers hand payloads to a sink. */
export interface AgentCapabilities {
  canProduce: boolean;
  canConsume: boolean;
}

/** Snapshot of the unused entries selected for one processing cycle. */
export interface ActivationRecord {
  agentId: AgentId;
  entries: readonly CachedMessage[];
  /** 1-based attempt number for this batch of input */
  attempt: number;
  startedAt: string;
}

// ─── Directives (reasoning output) ───────────────────────────────────

export type RoutingSignal =
  | { type: 'EXPLORE'; keyword: string }
  | { type: 'STOP_EXPLORE'; keyword: string }
  | { type: 'SEEK'; keyword: string; target?: AgentId }
  | { type: 'ACCEPT_INPUT'; id: AgentId; keyword: string }
  | { type: 'REJECT_INPUT'; keyword: string };

export interface MessageDirective {
  kind: 'message';
  keyword: string;
  payload: string;
  /** Restrict delivery to this destination when it is among the resolved ones */
  destinationHint?: AgentId;
}

export interface StateDirective {
  kind: 'state';
  state: string;
}

export interface SignalDirective {
  kind: 'signal';
  signal: RoutingSignal;
}

export type Directive = MessageDirective | StateDirective | SignalDirective;

// ─── Reasoning collaborator ──────────────────────────────────────────

export interface ReasoningRequest {
  agentId: AgentId;
  /** Static instruction text from the agent's definition, passed through unexamined */
  instructions: string;
  /** Free-form state the agent last reported about itself */
  selfState: string;
  /** Keywords the agent currently has output connections for */
  outputKeywords: string[];
  messages: readonly InboundMessage[];
}

export type ReasoningFailureKind = 'timeout' | 'malformed-output' | 'transport-error';

export type ReasoningResult =
  | { ok: true; directives: Directive[] }
  | { ok: false; failure: ReasoningFailureKind; message: string };

/**
 * The processing step an activation invokes. Implementations should honour
 * `signal`; the runtime stops waiting once it aborts either way.
 */
export interface Reasoner {
  invoke(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResult>;
}

// ─── Agent definitions ───────────────────────────────────────────────

export interface CacheSettings {
  capacity?: number;
  dedup?: boolean;
}

/**
 * What a kind factory produces from a configuration record. One concrete
 * Agent type is built from it; behaviour differs only by these fields.
 */
export interface AgentDefinition {
  instructions: string;
  activationKeywords: string[];
  capabilities: AgentCapabilities;
  /** Falls back to the system's default reasoner when omitted */
  reasoner?: Reasoner;
  selfState?: string;
  cache?: CacheSettings;
}
