// packages/core/tests/helpers/fixtures.ts -- Shared builders for debate test data

import { createAgentConfig, createTopic } from '../../src/agents/agent-config.js';
import { failedResponse, succeededResponse } from '../../src/agents/responses.js';
import type { AgentConfig, DebateRecord, DebateRole, DebateTopic } from '../../src/types/debate.js';

export const TOPIC: DebateTopic = createTopic({
  title: 'Remote work',
  description: 'Should teams default to remote-first?',
});

export function agentConfig(role: DebateRole, overrides: { name?: string; timeoutSeconds?: number } = {}): AgentConfig {
  return createAgentConfig({
    name: overrides.name ?? `Claude ${role}`,
    role,
    provider: 'claude',
    modelName: 'haiku',
    timeoutSeconds: overrides.timeoutSeconds,
  });
}

export function threeConfigs(): AgentConfig[] {
  return [agentConfig('FOR'), agentConfig('AGAINST'), agentConfig('SYNTHESIS')];
}

export function makeRecord(
  debateId: string,
  options: { title?: string; createdAt?: string; failAgainst?: boolean } = {},
): DebateRecord {
  const [forConfig, againstConfig, synthesisConfig] = [
    agentConfig('FOR'),
    agentConfig('AGAINST'),
    agentConfig('SYNTHESIS'),
  ];
  return {
    debateId,
    topic: createTopic({ title: options.title ?? 'Remote work', description: 'Should teams default to remote-first?' }),
    agentsConfig: [forConfig, againstConfig, synthesisConfig],
    agentResponses: [
      succeededResponse(forConfig, 'Remote work widens the hiring pool.', 120.5),
      options.failAgainst
        ? failedResponse(againstConfig, 'Agent Claude AGAINST timed out after 60s', 60000)
        : succeededResponse(againstConfig, 'Collaboration suffers without shared space.', 98.25),
      succeededResponse(synthesisConfig, 'Hybrid arrangements balance both concerns.', 150),
    ],
    totalExecutionTimeMs: 368.75,
    createdAt: options.createdAt ?? '2025-03-04T05:06:07.890Z',
  };
}
