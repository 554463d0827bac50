// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { ProjectConfig } from '../types/config.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_SEC } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';

const storageConfigSchema = z.object({
  backend: z.enum(['json', 'sqlite']).default(DEFAULT_CONFIG.storage.backend),
  dir: z.string().min(1).default(DEFAULT_CONFIG.storage.dir),
  dbPath: z.string().min(1).default(DEFAULT_CONFIG.storage.dbPath),
});

const agentsConfigSchema = z.object({
  lineup: z.enum(['claude', 'gemini', 'mixed']).default(DEFAULT_CONFIG.agents.lineup),
  temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  timeoutSeconds: z.number().positive().default(DEFAULT_TIMEOUT_SEC),
});

const providerCommandSchema = (fallback: string) =>
  z.object({ command: z.string().min(1).default(fallback) }).default({});

const providersConfigSchema = z.object({
  claude: providerCommandSchema(DEFAULT_CONFIG.providers.claude.command),
  gemini: providerCommandSchema(DEFAULT_CONFIG.providers.gemini.command),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default(DEFAULT_CONFIG.advanced.logLevel),
});

export const projectConfigSchema = z.object({
  storage: storageConfigSchema.default({}),
  agents: agentsConfigSchema.default({}),
  providers: providersConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error.issues[0]?.path.join('.'));
  }
  return result.data;
}
