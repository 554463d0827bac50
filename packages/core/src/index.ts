// @threefold/core - Three-stage debate engine

export const VERSION = '0.1.0';

// Type definitions
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
  // Config
  AdvancedConfig,
  AgentDefaults,
  AgentsConfig,
  LineupName,
  ProjectConfig,
  ProviderCommandConfig,
  ProvidersConfig,
  StorageBackend,
  StorageConfig,
  // Events
  DebateEvent,
  DebateEventType,
} from './types/index.js';
export { AGENT_PROVIDERS, DEBATE_ROLES } from './types/index.js';

// Utilities
export {
  generateDebateId,
  AgentExecutionError,
  ConfigError,
  DebateNotFoundError,
  DebatePersistenceError,
  StorageError,
  errorMessage,
  createLogger,
} from './utils/index.js';
export type { AgentFailureKind, Logger, LogLevel } from './utils/index.js';
export {
  CONFIG_FILENAME,
  DATA_DIRNAME,
  DEFAULT_LIST_LIMIT,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SEC,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  LINEUPS,
  buildLineup,
  deepMerge,
  isLineupName,
  loadConfig,
  projectConfigSchema,
  validateConfig,
  writeConfig,
} from './config/index.js';
export type { ConfigOverrides, LoadConfigOptions, ProjectConfigInput } from './config/index.js';

// Prompts
export {
  buildAgainstPrompt,
  buildForPrompt,
  buildStagePrompt,
  buildSynthesisPrompt,
} from './prompts/index.js';

// Agents
export {
  AgentRunner,
  CliAgent,
  PROVIDER_SPECS,
  buildFilteredEnv,
  claudeSpec,
  clearDetectionCache,
  createAgent,
  createAgentConfig,
  createTopic,
  detectAgentCli,
  failedResponse,
  geminiSpec,
  knownModelNames,
  resolveModelId,
  runProcess,
  stripCredentialNoise,
  succeededResponse,
} from './agents/index.js';
export type {
  Agent,
  AgentConfigInput,
  AgentExecutor,
  AgentRunnerOptions,
  CliAgentOptions,
  CliDetectionResult,
  DebateTopicInput,
  ProcessResult,
  ProgressCallbacks,
  ProviderSpec,
  RunProcessOptions,
} from './agents/index.js';

// Storage
export {
  JsonFileDebateStore,
  SqliteDebateStore,
  debateDocumentSchema,
  fromDocument,
  getSchemaVersion,
  openDatabase,
  openDebateStore,
  parseDebateJson,
  runMigrations,
  serializeDebate,
  toDocument,
} from './storage/index.js';
export type {
  DebateDocument,
  DebateRecordStore,
  JsonFileDebateStoreOptions,
  OpenedDebateStore,
} from './storage/index.js';

// Engine
export {
  DebateOrchestrator,
  EventBus,
  sortByExecutionOrder,
  validateAgentConfigs,
} from './engine/index.js';
export type { DebateOrchestratorOptions, OrderedAgentConfigs } from './engine/index.js';

// Report
export {
  formatDebate,
  formatDebateJson,
  formatDebateList,
  formatDebateMarkdown,
  formatDebateText,
  formatMs,
  formatTimestamp,
} from './report/index.js';
export type { DebateFormat } from './report/index.js';
