// packages/core/src/types/config.ts

import type { AgentProvider } from './debate.js';

export type StorageBackend = 'json' | 'sqlite';

export type LineupName = 'claude' | 'gemini' | 'mixed';

export interface StorageConfig {
  backend: StorageBackend;
  /** Directory for the JSON backend, relative to the project dir. */
  dir: string;
  /** Database file for the SQLite backend, relative to the project dir. */
  dbPath: string;
}

export interface AgentDefaults {
  temperature: number;
  maxTokens: number;
  timeoutSeconds: number;
}

export interface AgentsConfig extends AgentDefaults {
  lineup: LineupName;
}

export interface ProviderCommandConfig {
  command: string;
}

export type ProvidersConfig = Record<AgentProvider, ProviderCommandConfig>;

export interface AdvancedConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export interface ProjectConfig {
  storage: StorageConfig;
  agents: AgentsConfig;
  providers: ProvidersConfig;
  advanced: AdvancedConfig;
}
