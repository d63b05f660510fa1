/**
 * Agent Runtime — Public API
 */

export {
  type AgentId,
  type InboundMessage,
  type CachedMessage,
  type AgentLifecycleState,
  type AgentCapabilities,
  type ActivationRecord,
  type RoutingSignal,
  type Directive,
  type MessageDirective,
  type StateDirective,
  type SignalDirective,
  type ReasoningRequest,
  type ReasoningResult,
  type ReasoningFailureKind,
  type Reasoner,
  type CacheSettings,
  type AgentDefinition,
} from './agent-protocol.js';
export { Agent, type ActivationHost } from './agent.js';
export { AgentBus, type BusStats, type DeliveryRecord, type DeliveryTarget, type PublishOptions } from './agent-bus.js';
export { AgentKindRegistry, type KindDescription } from './agent-registry.js';
export {
  AgentSystem,
  SEEK_RESULT_KEYWORD,
  REGISTRY_SENDER,
  type AgentSystemOptions,
  type CreateAgentOptions,
  type AgentDiscoveryInfo,
} from './agent-system.js';
export { ActivationStats, type ActivationStatsSnapshot } from './activation-stats.js';
export {
  ConnectionRegistry,
  type AgentDiscovery,
  type InputConnection,
  type OutputConnection,
} from './connection-registry.js';
export { parseDirectives, parseSignals, SELF_STATE_TAG, SIGNAL_TAG, type ParseResult } from './directive-parser.js';
export {
  AgentMeshError,
  FailureLog,
  FAILURE_KINDS,
  type FailureEvent,
  type FailureKind,
  type MeshErrorCode,
} from './failures.js';
export {
  MessageCache,
  DEFAULT_CACHE_CAPACITY,
  type AppendResult,
  type CacheSnapshot,
  type MessageCacheOptions,
} from './message-cache.js';
export {
  PersistenceAdapter,
  AgentSnapshotSchema,
  parseSnapshot,
  type AgentSnapshot,
  type PersistenceOptions,
  type PersistenceStore,
  type SnapshotSource,
} from './persistence.js';
export { ActivationScheduler, type ActivationTask } from './scheduler.js';
export { describeTopology, type AgentDescription, type KeywordSubgraph, type SystemTopology } from './topology.js';
