import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { LineupName, StorageBackend } from '@threefold/core';
import { CONFIG_FILENAME, buildLineup, loadConfig, writeConfig } from '@threefold/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import type { GlobalOptions } from '../utils.js';
import { reportError } from '../utils.js';

interface InitOptions {
  force?: boolean;
  lineup?: LineupName;
  backend?: StorageBackend;
}

export async function initCommand(options: InitOptions, command: Command): Promise<void> {
  try {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const cwd = resolve(globals.cwd ?? process.cwd());
    const configPath = join(cwd, CONFIG_FILENAME);

    if (existsSync(configPath) && !options.force) {
      console.error(chalk.red('Already initialized. Use --force to overwrite.'));
      process.exitCode = 1;
      return;
    }

    // Start from defaults; an existing file is being replaced
    const config = loadConfig({
      projectDir: cwd,
      skipFile: true,
      overrides: {
        agents: options.lineup ? { lineup: options.lineup } : undefined,
        storage: options.backend ? { backend: options.backend } : undefined,
      },
    });

    const written = writeConfig(config, cwd);
    console.log(chalk.green(`\nInitialized ${written}`));
    console.log(chalk.gray(`  storage: ${config.storage.backend} (${config.storage.backend === 'sqlite' ? config.storage.dbPath : config.storage.dir})`));
    for (const agent of buildLineup(config.agents.lineup, config.agents)) {
      console.log(chalk.gray(`  ${agent.role}: ${agent.name} (${agent.modelId})`));
    }

    console.log(chalk.gray('\nNext: threefold debate --topic "..." --description "..."'));
  } catch (error) {
    reportError(error);
  }
}
