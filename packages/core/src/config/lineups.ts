// packages/core/src/config/lineups.ts -- Ready-made agent sets for the three roles

import { createAgentConfig } from '../agents/agent-config.js';
import type { AgentDefaults, LineupName } from '../types/config.js';
import type { AgentConfig, AgentProvider, DebateRole } from '../types/debate.js';
import { ConfigError } from '../utils/errors.js';

interface LineupSeat {
  role: DebateRole;
  provider: AgentProvider;
  modelName: string;
}

export const LINEUPS: Readonly<Record<LineupName, readonly LineupSeat[]>> = {
  claude: [
    { role: 'FOR', provider: 'claude', modelName: 'haiku' },
    { role: 'AGAINST', provider: 'claude', modelName: 'haiku' },
    { role: 'SYNTHESIS', provider: 'claude', modelName: 'haiku' },
  ],
  gemini: [
    { role: 'FOR', provider: 'gemini', modelName: 'flash' },
    { role: 'AGAINST', provider: 'gemini', modelName: 'flash' },
    { role: 'SYNTHESIS', provider: 'gemini', modelName: 'flash' },
  ],
  mixed: [
    { role: 'FOR', provider: 'claude', modelName: 'haiku' },
    { role: 'AGAINST', provider: 'gemini', modelName: 'flash' },
    { role: 'SYNTHESIS', provider: 'claude', modelName: 'haiku' },
  ],
};

const PROVIDER_LABELS: Record<AgentProvider, string> = {
  claude: 'Claude',
  gemini: 'Gemini',
};

export function isLineupName(value: string): value is LineupName {
  return Object.hasOwn(LINEUPS, value);
}

/**
 * Build the three agent configs for a named lineup, e.g. "Claude FOR",
 * "Gemini AGAINST", "Claude SYNTHESIS" for `mixed`.
 */
export function buildLineup(name: string, defaults: Partial<AgentDefaults> = {}): AgentConfig[] {
  if (!isLineupName(name)) {
    throw new ConfigError(
      `Unknown lineup "${name}". Expected one of: ${Object.keys(LINEUPS).join(', ')}`,
      'agents.lineup',
    );
  }
  return LINEUPS[name].map((seat) =>
    createAgentConfig({
      name: `${PROVIDER_LABELS[seat.provider]} ${seat.role}`,
      role: seat.role,
      provider: seat.provider,
      modelName: seat.modelName,
      temperature: defaults.temperature,
      maxTokens: defaults.maxTokens,
      timeoutSeconds: defaults.timeoutSeconds,
    }),
  );
}
