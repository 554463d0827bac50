// packages/core/src/agents/responses.ts

import type { AgentConfig, FailedAgentResponse, SucceededAgentResponse } from '../types/debate.js';

export function succeededResponse(
  config: AgentConfig,
  responseText: string,
  executionTimeMs: number,
): SucceededAgentResponse {
  const response: SucceededAgentResponse = {
    agentName: config.name,
    role: config.role,
    provider: config.provider,
    modelName: config.modelName,
    responseText,
    executionTimeMs: Math.max(0, executionTimeMs),
    success: true,
  };
  return Object.freeze(response);
}

/** A failed response always carries a message, falling back to a generic one. */
export function failedResponse(
  config: AgentConfig,
  errorMessage: string,
  executionTimeMs: number,
  responseText = '',
): FailedAgentResponse {
  const response: FailedAgentResponse = {
    agentName: config.name,
    role: config.role,
    provider: config.provider,
    modelName: config.modelName,
    responseText,
    executionTimeMs: Math.max(0, executionTimeMs),
    success: false,
    errorMessage: errorMessage || `Agent ${config.name} failed`,
  };
  return Object.freeze(response);
}
