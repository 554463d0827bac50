import { Command, Option } from 'commander';

import { DEFAULT_LIST_LIMIT, VERSION } from '@threefold/core';

import { debateCommand } from './commands/debate.js';
import {
  debatesDeleteCommand,
  debatesExportCommand,
  debatesListCommand,
  debatesViewCommand,
} from './commands/debates.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { parsePositiveInt } from './utils.js';

const LINEUP_CHOICES = ['claude', 'gemini', 'mixed'];

export function createProgram(): Command {
  const program = new Command();

  program
    .name('threefold')
    .description('Three-stage debates between AI agents: for, against, synthesis')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging')
    .option('-C, --cwd <dir>', 'Run as if started in <dir>');

  program
    .command('debate')
    .description('Run a debate on the given topic')
    .requiredOption('--topic <title>', 'Debate topic title')
    .requiredOption('--description <text>', 'Debate topic description')
    .addOption(new Option('--lineup <name>', 'Agent lineup (default: from config)').choices(LINEUP_CHOICES))
    .option('--timeout <seconds>', 'Per-agent timeout in seconds', parsePositiveInt('Timeout'))
    .option('--output <file>', 'Also write the debate to a file')
    .action(debateCommand);

  const debates = program
    .command('debates')
    .description('Manage stored debates');

  debates
    .command('list')
    .description('List stored debates, most recent first')
    .option('--limit <n>', 'Max results', parsePositiveInt('Limit'), DEFAULT_LIST_LIMIT)
    .action(debatesListCommand);

  debates
    .command('view')
    .description('Show a stored debate')
    .argument('<debate-id>', 'Debate ID')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'markdown', 'json']).default('text'))
    .action(debatesViewCommand);

  debates
    .command('export')
    .description('Export a debate to a file')
    .argument('<debate-id>', 'Debate ID')
    .requiredOption('--output <path>', 'Output file path')
    .addOption(new Option('--format <format>', 'Export format').choices(['markdown', 'json', 'text']).default('markdown'))
    .action(debatesExportCommand);

  debates
    .command('delete')
    .description('Delete a stored debate')
    .argument('<debate-id>', 'Debate ID')
    .action(debatesDeleteCommand);

  program
    .command('init')
    .description('Write .threefold.yml in the current project')
    .option('--force', 'Overwrite existing .threefold.yml')
    .addOption(new Option('--lineup <name>', 'Default agent lineup').choices(LINEUP_CHOICES))
    .addOption(new Option('--backend <backend>', 'Storage backend').choices(['json', 'sqlite']))
    .action(initCommand);

  program
    .command('doctor')
    .description('Preflight diagnostics: agent CLIs, config, storage, node')
    .action(doctorCommand);

  return program;
}
