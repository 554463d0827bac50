// packages/core/src/agents/detector.ts -- Detect agent CLI availability

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { AgentProvider } from '../types/debate.js';
import { PROVIDER_SPECS } from './providers.js';

const execFileAsync = promisify(execFile);

export interface CliDetectionResult {
  provider: AgentProvider;
  command: string;
  available: boolean;
  path?: string;
  version?: string;
  detectedAt: number;
  error?: string;
}

// Cache TTL: 5 minutes
const CACHE_TTL = 5 * 60 * 1000;
const cache = new Map<string, CliDetectionResult>();

export async function detectAgentCli(
  provider: AgentProvider,
  command: string = PROVIDER_SPECS[provider].command,
): Promise<CliDetectionResult> {
  const key = `${provider}:${command}`;
  const cached = cache.get(key);
  if (cached && Date.now() - cached.detectedAt < CACHE_TTL) {
    return cached;
  }

  const result = await probeCli(provider, command);
  cache.set(key, result);
  return result;
}

export function clearDetectionCache(): void {
  cache.clear();
}

async function probeCli(provider: AgentProvider, command: string): Promise<CliDetectionResult> {
  const now = Date.now();

  const whichCmd = process.platform === 'win32' ? 'where' : 'which';
  let exePath: string;
  try {
    const { stdout } = await execFileAsync(whichCmd, [command], { timeout: 5000 });
    exePath = stdout.trim().split('\n')[0] ?? command;
  } catch {
    return {
      provider,
      command,
      available: false,
      detectedAt: now,
      error: `${command} not found in PATH`,
    };
  }

  let version: string | undefined;
  try {
    const { stdout } = await execFileAsync(command, ['--version'], { timeout: 5000 });
    version = stdout.trim();
  } catch {
    // Version check failed, continue without it
  }

  return { provider, command, available: true, path: exePath, version, detectedAt: now };
}
