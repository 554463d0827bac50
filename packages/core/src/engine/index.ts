// packages/core/src/engine -- Debate orchestration

export { DebateOrchestrator } from './orchestrator.js';
export type { DebateOrchestratorOptions } from './orchestrator.js';
export { EventBus } from './event-bus.js';
export { sortByExecutionOrder, validateAgentConfigs } from './validation.js';
export type { OrderedAgentConfigs } from './validation.js';
