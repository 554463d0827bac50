// packages/core/src/types/index.ts -- barrel re-export

export { AGENT_PROVIDERS, DEBATE_ROLES } from './debate.js';
export type {
  AgentConfig,
  AgentProvider,
  AgentResponse,
  DebateIndexEntry,
  DebateRecord,
  DebateRole,
  DebateTopic,
  FailedAgentResponse,
  StageResponses,
  SucceededAgentResponse,
} from './debate.js';
export type {
  AdvancedConfig,
  AgentDefaults,
  AgentsConfig,
  LineupName,
  ProjectConfig,
  ProviderCommandConfig,
  ProvidersConfig,
  StorageBackend,
  StorageConfig,
} from './config.js';
export type { DebateEvent, DebateEventType } from './events.js';
