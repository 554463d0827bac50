// packages/core/src/engine/validation.ts -- Role-set checks and execution ordering

import type { AgentConfig, DebateRole } from '../types/debate.js';
import { DEBATE_ROLES } from '../types/debate.js';
import { ConfigError } from '../utils/errors.js';

const ROLE_ORDER: Record<DebateRole, number> = {
  FOR: 0,
  AGAINST: 1,
  SYNTHESIS: 2,
};

export type OrderedAgentConfigs = readonly [AgentConfig, AgentConfig, AgentConfig];

/**
 * Exactly three configs whose roles are FOR, AGAINST and SYNTHESIS,
 * each once. Throws ConfigError otherwise.
 */
export function validateAgentConfigs(configs: readonly AgentConfig[]): void {
  if (configs.length !== DEBATE_ROLES.length) {
    throw new ConfigError(`Debate requires exactly 3 agents, got ${configs.length}`, 'agents');
  }

  const roles = configs.map((c) => c.role);
  const seen = new Set<DebateRole>();
  for (const role of roles) {
    if (seen.has(role)) {
      throw new ConfigError(`Duplicate agent role ${role}. Got: ${roles.join(', ')}`, 'agents.role');
    }
    seen.add(role);
  }

  const missing = DEBATE_ROLES.filter((r) => !seen.has(r));
  if (missing.length > 0) {
    throw new ConfigError(
      `Agents must have roles FOR, AGAINST, SYNTHESIS. Got: ${roles.join(', ')}`,
      'agents.role',
    );
  }
}

/** Validate, then return the configs as FOR, AGAINST, SYNTHESIS. */
export function sortByExecutionOrder(configs: readonly AgentConfig[]): OrderedAgentConfigs {
  validateAgentConfigs(configs);
  const [first, second, third] = [...configs].sort((a, b) => ROLE_ORDER[a.role] - ROLE_ORDER[b.role]);
  return [first, second, third];
}
