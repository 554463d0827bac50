// packages/core/src/agents/agent-config.ts -- Validated construction of topics and agent configs

import { z } from 'zod';
import type { AgentConfig, DebateTopic } from '../types/debate.js';
import { AGENT_PROVIDERS, DEBATE_ROLES } from '../types/debate.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_SEC } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { resolveModelId } from './model-ids.js';

const nonBlank = z.string().trim().min(1, 'must not be empty');

const topicSchema = z.object({
  title: nonBlank,
  description: nonBlank,
});

const agentConfigInputSchema = z.object({
  name: nonBlank,
  role: z.enum(DEBATE_ROLES),
  provider: z.enum(AGENT_PROVIDERS),
  modelName: nonBlank,
  modelId: z.string().optional(),
  temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  timeoutSeconds: z.number().positive().default(DEFAULT_TIMEOUT_SEC),
});

export type DebateTopicInput = z.input<typeof topicSchema>;
export type AgentConfigInput = z.input<typeof agentConfigInputSchema>;

function toConfigError(prefix: string, error: z.ZodError): ConfigError {
  const first = error.issues[0];
  const field = first?.path.join('.') || undefined;
  const issues = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  return new ConfigError(`${prefix}: ${issues}`, field);
}

export function createTopic(input: DebateTopicInput): DebateTopic {
  const result = topicSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError('Invalid topic', result.error);
  }
  // Validation trims for the emptiness check only; the caller's text is kept as given
  return Object.freeze({ title: input.title, description: input.description });
}

/**
 * Validate an agent config, fill defaults and resolve the model identifier.
 * Throws ConfigError on invalid input.
 */
export function createAgentConfig(input: AgentConfigInput): AgentConfig {
  const result = agentConfigInputSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError(`Invalid agent config "${String(input.name)}"`, result.error);
  }
  const data = result.data;
  const explicitId = data.modelId?.trim();
  const modelId = explicitId ? explicitId : resolveModelId(data.provider, data.modelName);
  return Object.freeze({
    name: data.name,
    role: data.role,
    provider: data.provider,
    modelName: data.modelName,
    modelId,
    temperature: data.temperature,
    maxTokens: data.maxTokens,
    timeoutSeconds: data.timeoutSeconds,
  });
}
