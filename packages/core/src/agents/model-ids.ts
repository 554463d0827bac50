// packages/core/src/agents/model-ids.ts -- Short model name -> CLI model identifier

import type { AgentProvider } from '../types/debate.js';

const MODEL_IDS: Record<AgentProvider, Record<string, string>> = {
  claude: {
    haiku: 'claude-haiku-4-5-20251001',
    sonnet: 'claude-sonnet-4-5-20250929',
    opus: 'claude-opus-4-5-20251101',
  },
  gemini: {
    'flash-lite': 'gemini-2.5-flash-lite',
    flash: 'gemini-2.5-flash',
    pro: 'gemini-2.5-pro',
  },
};

/**
 * Resolve the identifier handed to the provider's CLI.
 * Unknown names fall back to `<provider>-<modelName>`.
 */
export function resolveModelId(provider: AgentProvider, modelName: string): string {
  const known = MODEL_IDS[provider];
  if (Object.hasOwn(known, modelName)) {
    return known[modelName];
  }
  return `${provider}-${modelName}`;
}

/** Short names with a known mapping for a provider. */
export function knownModelNames(provider: AgentProvider): string[] {
  return Object.keys(MODEL_IDS[provider]);
}
