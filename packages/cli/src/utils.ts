import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import type { DebateRecordStore, Logger, ProjectConfig } from '@threefold/core';
import { createLogger, errorMessage, loadConfig, openDebateStore } from '@threefold/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

export type GlobalOptions = {
  verbose?: boolean;
  cwd?: string;
}

export interface CommandContext {
  projectDir: string;
  config: ProjectConfig;
  logger: Logger;
  verbose: boolean;
}

/**
 * Resolve the project directory, config and logger for a command,
 * honouring the global `--cwd` and `--verbose` flags.
 */
export function createContext(command: Command): CommandContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const projectDir = resolve(globals.cwd ?? process.cwd());
  const config = loadConfig({ projectDir });
  const verbose = globals.verbose === true;
  const logger = createLogger(verbose ? 'debug' : config.advanced.logLevel);
  return { projectDir, config, logger, verbose };
}

/**
 * Run a command function with a record store that is closed afterwards,
 * even when the function throws.
 */
export async function withStore<T>(
  context: CommandContext,
  fn: (store: DebateRecordStore) => Promise<T> | T,
): Promise<T> {
  const opened = openDebateStore(context.config.storage, context.projectDir);
  context.logger.debug(`Using ${context.config.storage.backend} store at ${opened.location}`);
  try {
    return await fn(opened.store);
  } finally {
    opened.close();
  }
}

/** Write command output to a file, creating parent directories. */
export function writeOutputFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}

/** Print an error and mark the process as failed. */
export function reportError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}

export function parsePositiveInt(label: string) {
  return (value: string): number => {
    if (!/^\d+$/.test(value)) throw new InvalidArgumentError(`${label} must be a positive integer`);
    const n = Number.parseInt(value, 10);
    if (n <= 0) throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };
}
