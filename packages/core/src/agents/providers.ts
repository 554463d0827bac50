// packages/core/src/agents/providers.ts -- Per-provider CLI argument shape and output cleanup

import type { AgentProvider } from '../types/debate.js';

export interface ProviderSpec {
  readonly provider: AgentProvider;
  /** Executable looked up on PATH unless overridden by config. */
  readonly command: string;
  /** Auth env vars forwarded to the subprocess. */
  readonly authEnv: readonly string[];
  buildArgs(modelId: string, prompt: string): string[];
  sanitizeOutput(stdout: string): string;
}

export const claudeSpec: ProviderSpec = {
  provider: 'claude',
  command: 'claude',
  authEnv: ['ANTHROPIC_API_KEY', 'CLAUDE_CONFIG_DIR'],
  buildArgs: (modelId, prompt) => ['--model', modelId, '--print', prompt],
  sanitizeOutput: (stdout) => stdout.trim(),
};

export const geminiSpec: ProviderSpec = {
  provider: 'gemini',
  command: 'gemini',
  authEnv: ['GEMINI_API_KEY', 'GOOGLE_API_KEY', 'GOOGLE_CLOUD_PROJECT'],
  buildArgs: (modelId, prompt) => ['--yolo', '-m', modelId, prompt],
  sanitizeOutput: stripCredentialNoise,
};

export const PROVIDER_SPECS: Record<AgentProvider, ProviderSpec> = {
  claude: claudeSpec,
  gemini: geminiSpec,
};

/** gemini prints "Loaded cached credentials." and similar lines on stdout. */
export function stripCredentialNoise(stdout: string): string {
  return stdout
    .split('\n')
    .filter((line) => !line.toLowerCase().includes('credentials'))
    .join('\n')
    .trim();
}
