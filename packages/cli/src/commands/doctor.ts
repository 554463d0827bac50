// packages/cli/src/commands/doctor.ts -- Preflight diagnostics

import { accessSync, constants, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import type { AgentProvider, ProjectConfig } from '@threefold/core';
import {
  AGENT_PROVIDERS,
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  JsonFileDebateStore,
  LINEUPS,
  VERSION,
  detectAgentCli,
  errorMessage,
  getSchemaVersion,
  loadConfig,
  openDatabase,
} from '@threefold/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import type { GlobalOptions } from '../utils.js';

interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

const INSTALL_HINTS: Record<AgentProvider, string> = {
  claude: 'npm install -g @anthropic-ai/claude-code',
  gemini: 'npm install -g @google/gemini-cli',
};

const MIN_NODE_MAJOR = 20;

export async function doctorCommand(_options: Record<string, never>, command: Command): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const cwd = resolve(globals.cwd ?? process.cwd());
  const checks: Check[] = [];

  console.error(chalk.cyan(`\n  threefold doctor v${VERSION}\n`));

  // 1. Config file
  let config: ProjectConfig = DEFAULT_CONFIG;
  if (existsSync(join(cwd, CONFIG_FILENAME))) {
    try {
      config = loadConfig({ projectDir: cwd });
      checks.push({ name: 'config', status: 'pass', message: `${CONFIG_FILENAME} found` });
    } catch (err) {
      checks.push({
        name: 'config',
        status: 'fail',
        message: errorMessage(err),
        fix: `Fix ${CONFIG_FILENAME} or regenerate it with threefold init --force`,
      });
    }
  } else {
    checks.push({
      name: 'config',
      status: 'warn',
      message: `${CONFIG_FILENAME} not found, using defaults`,
      fix: 'threefold init',
    });
  }

  // 2. Agent CLIs; only the ones the configured lineup uses are required
  const required = new Set(LINEUPS[config.agents.lineup].map((seat) => seat.provider));
  for (const provider of AGENT_PROVIDERS) {
    const detection = await detectAgentCli(provider, config.providers[provider].command);
    if (detection.available) {
      checks.push({
        name: `${provider}-cli`,
        status: 'pass',
        message: `${detection.command} ${detection.version ?? ''}`.trim(),
      });
    } else {
      checks.push({
        name: `${provider}-cli`,
        status: required.has(provider) ? 'fail' : 'warn',
        message: detection.error ?? `${detection.command} not found`,
        fix: INSTALL_HINTS[provider],
      });
    }
  }

  // 3. Storage
  checks.push(checkStorage(config, cwd));

  // 4. Node version
  const nodeVersion = process.version;
  const major = Number.parseInt(nodeVersion.slice(1).split('.')[0] ?? '0', 10);
  if (major >= MIN_NODE_MAJOR) {
    checks.push({ name: 'node', status: 'pass', message: `Node.js ${nodeVersion}` });
  } else {
    checks.push({
      name: 'node',
      status: 'fail',
      message: `Node.js ${nodeVersion} is too old (requires >= ${MIN_NODE_MAJOR})`,
      fix: `Install Node.js ${MIN_NODE_MAJOR}+`,
    });
  }

  // Print results
  let hasFailure = false;
  for (const check of checks) {
    const icon = check.status === 'pass'
      ? chalk.green('PASS')
      : check.status === 'warn'
        ? chalk.yellow('WARN')
        : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }

  console.error('');

  console.log(JSON.stringify({ version: VERSION, checks, healthy: !hasFailure }, null, 2));

  if (hasFailure) {
    process.exitCode = 1;
  }
}

function checkStorage(config: ProjectConfig, cwd: string): Check {
  if (config.storage.backend === 'sqlite') {
    const dbPath = resolve(cwd, config.storage.dbPath);
    if (!existsSync(dbPath)) {
      return checkWritableParent('storage', dirname(dbPath), 'Database will be created on first debate');
    }
    try {
      const db = openDatabase(dbPath);
      try {
        return { name: 'storage', status: 'pass', message: `SQLite schema version ${getSchemaVersion(db) ?? 'unknown'}` };
      } finally {
        db.close();
      }
    } catch (err) {
      return { name: 'storage', status: 'fail', message: errorMessage(err) };
    }
  }

  const dir = resolve(cwd, config.storage.dir);
  if (!existsSync(dir)) {
    return checkWritableParent('storage', dir, 'Debate directory will be created on first debate');
  }
  try {
    accessSync(dir, constants.W_OK);
  } catch {
    return {
      name: 'storage',
      status: 'fail',
      message: `${config.storage.dir} is not writable`,
      fix: `Check file permissions on ${config.storage.dir}`,
    };
  }
  const count = new JsonFileDebateStore({ dir }).loadIndex().length;
  return { name: 'storage', status: 'pass', message: `${count} debate(s) indexed in ${config.storage.dir}` };
}

/** Walk up to the nearest existing directory and check it is writable. */
function checkWritableParent(name: string, target: string, message: string): Check {
  let dir = target;
  while (!existsSync(dir)) {
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  try {
    accessSync(dir, constants.W_OK);
    return { name, status: 'warn', message };
  } catch {
    return { name, status: 'fail', message: `${dir} is not writable`, fix: `Check file permissions on ${dir}` };
  }
}
