// packages/core/src/storage/codec.ts -- DebateRecord <-> persisted JSON document

import { z } from 'zod';
import type {
  AgentConfig,
  AgentResponse,
  DebateIndexEntry,
  DebateRecord,
  FailedAgentResponse,
  StageResponses,
  SucceededAgentResponse,
} from '../types/debate.js';
import { AGENT_PROVIDERS, DEBATE_ROLES } from '../types/debate.js';
import { StorageError } from '../utils/errors.js';

// Persisted field names are snake_case so existing debate files stay readable.

const roleSchema = z.enum(DEBATE_ROLES);
const providerSchema = z.enum(AGENT_PROVIDERS);

const agentConfigDocSchema = z.object({
  name: z.string(),
  role: roleSchema,
  model_provider: providerSchema,
  model_name: z.string(),
  model_id: z.string(),
  temperature: z.number().min(0).max(1),
  max_tokens: z.number().int().positive(),
  timeout_seconds: z.number().positive(),
});

const agentResponseDocSchema = z.object({
  agent_name: z.string(),
  role: roleSchema,
  model_provider: providerSchema,
  model_name: z.string(),
  response_text: z.string(),
  execution_time_ms: z.number().nonnegative(),
  success: z.boolean(),
  error_message: z.string().nullable(),
});

export const debateDocumentSchema = z.object({
  debate_id: z.string().min(1),
  topic: z.object({ title: z.string(), description: z.string() }),
  agents_config: z.array(agentConfigDocSchema),
  agent_responses: z.tuple([agentResponseDocSchema, agentResponseDocSchema, agentResponseDocSchema]),
  total_execution_time_ms: z.number().nonnegative(),
  created_at: z.string().min(1),
});

export type DebateDocument = z.infer<typeof debateDocumentSchema>;

const indexEntryDocSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  topic_title: z.string(),
});

export const debateIndexSchema = z.array(indexEntryDocSchema);

export type DebateIndexDocument = z.infer<typeof debateIndexSchema>;

type AgentResponseDoc = z.infer<typeof agentResponseDocSchema>;

function responseToDoc(response: AgentResponse): AgentResponseDoc {
  return {
    agent_name: response.agentName,
    role: response.role,
    model_provider: response.provider,
    model_name: response.modelName,
    response_text: response.responseText,
    execution_time_ms: response.executionTimeMs,
    success: response.success,
    error_message: response.success ? null : response.errorMessage,
  };
}

function responseFromDoc(doc: AgentResponseDoc): AgentResponse {
  const base = {
    agentName: doc.agent_name,
    role: doc.role,
    provider: doc.model_provider,
    modelName: doc.model_name,
    responseText: doc.response_text,
    executionTimeMs: doc.execution_time_ms,
  };
  if (doc.success) {
    const succeeded: SucceededAgentResponse = { ...base, success: true };
    return Object.freeze(succeeded);
  }
  const failed: FailedAgentResponse = {
    ...base,
    success: false,
    errorMessage: doc.error_message ?? 'Unknown error',
  };
  return Object.freeze(failed);
}

export function toDocument(record: DebateRecord): DebateDocument {
  const [first, second, third] = record.agentResponses;
  return {
    debate_id: record.debateId,
    topic: { title: record.topic.title, description: record.topic.description },
    agents_config: record.agentsConfig.map((c) => ({
      name: c.name,
      role: c.role,
      model_provider: c.provider,
      model_name: c.modelName,
      model_id: c.modelId,
      temperature: c.temperature,
      max_tokens: c.maxTokens,
      timeout_seconds: c.timeoutSeconds,
    })),
    agent_responses: [responseToDoc(first), responseToDoc(second), responseToDoc(third)],
    total_execution_time_ms: record.totalExecutionTimeMs,
    created_at: record.createdAt,
  };
}

/** Validate an untrusted document and rebuild the record. Throws StorageError. */
export function fromDocument(raw: unknown): DebateRecord {
  const result = debateDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new StorageError(`Malformed debate document: ${issues}`, 'decode');
  }
  const doc = result.data;
  const agentsConfig: AgentConfig[] = doc.agents_config.map((c) =>
    Object.freeze({
      name: c.name,
      role: c.role,
      provider: c.model_provider,
      modelName: c.model_name,
      modelId: c.model_id,
      temperature: c.temperature,
      maxTokens: c.max_tokens,
      timeoutSeconds: c.timeout_seconds,
    }),
  );
  const [first, second, third] = doc.agent_responses;
  const agentResponses: StageResponses = [
    responseFromDoc(first),
    responseFromDoc(second),
    responseFromDoc(third),
  ];
  return Object.freeze({
    debateId: doc.debate_id,
    topic: Object.freeze({ title: doc.topic.title, description: doc.topic.description }),
    agentsConfig: Object.freeze(agentsConfig),
    agentResponses: Object.freeze(agentResponses),
    totalExecutionTimeMs: doc.total_execution_time_ms,
    createdAt: doc.created_at,
  });
}

/** Parse stored JSON text into a record. Throws StorageError. */
export function parseDebateJson(text: string): DebateRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StorageError(
      `Debate document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      'decode',
    );
  }
  return fromDocument(raw);
}

export function serializeDebate(record: DebateRecord): string {
  return JSON.stringify(toDocument(record), null, 2);
}

export function indexEntryFor(record: DebateRecord): DebateIndexEntry {
  return { id: record.debateId, createdAt: record.createdAt, topicTitle: record.topic.title };
}

export function indexToDocument(entries: readonly DebateIndexEntry[]): DebateIndexDocument {
  return entries.map((e) => ({ id: e.id, created_at: e.createdAt, topic_title: e.topicTitle }));
}

export function indexFromDocument(doc: DebateIndexDocument): DebateIndexEntry[] {
  return doc.map((e) => ({ id: e.id, createdAt: e.created_at, topicTitle: e.topic_title }));
}
