// packages/core/src/types/debate.ts -- Debate data model

/** Roles in execution order. */
export const DEBATE_ROLES = ['FOR', 'AGAINST', 'SYNTHESIS'] as const;

export type DebateRole = (typeof DEBATE_ROLES)[number];

export const AGENT_PROVIDERS = ['claude', 'gemini'] as const;

export type AgentProvider = (typeof AGENT_PROVIDERS)[number];

export interface DebateTopic {
  readonly title: string;
  readonly description: string;
}

export interface AgentConfig {
  /** Display label, e.g. "Claude FOR". */
  readonly name: string;
  readonly role: DebateRole;
  readonly provider: AgentProvider;
  /** Short model name, e.g. "sonnet" or "flash". */
  readonly modelName: string;
  /** Full identifier passed to the agent CLI. */
  readonly modelId: string;
  readonly temperature: number; // 0..1
  readonly maxTokens: number;
  readonly timeoutSeconds: number;
}

interface AgentResponseBase {
  readonly agentName: string;
  readonly role: DebateRole;
  readonly provider: AgentProvider;
  readonly modelName: string;
  readonly responseText: string;
  readonly executionTimeMs: number;
}

export interface SucceededAgentResponse extends AgentResponseBase {
  readonly success: true;
  readonly errorMessage?: undefined;
}

export interface FailedAgentResponse extends AgentResponseBase {
  readonly success: false;
  readonly errorMessage: string;
}

export type AgentResponse = SucceededAgentResponse | FailedAgentResponse;

/** Responses always in FOR, AGAINST, SYNTHESIS order. */
export type StageResponses = readonly [AgentResponse, AgentResponse, AgentResponse];

export interface DebateRecord {
  readonly debateId: string;
  readonly topic: DebateTopic;
  /** As supplied by the caller, not necessarily execution order. */
  readonly agentsConfig: readonly AgentConfig[];
  readonly agentResponses: StageResponses;
  readonly totalExecutionTimeMs: number;
  /** ISO-8601 */
  readonly createdAt: string;
}

/** Row of the listing index kept beside the records. */
export interface DebateIndexEntry {
  readonly id: string;
  readonly createdAt: string;
  readonly topicTitle: string;
}
