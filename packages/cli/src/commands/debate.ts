// packages/cli/src/commands/debate.ts -- Run a three-stage debate

import { resolve } from 'node:path';

import type { DebateRecord } from '@threefold/core';
import {
  AgentRunner,
  DebateOrchestrator,
  DebatePersistenceError,
  buildLineup,
  createTopic,
  formatDebateText,
} from '@threefold/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createProgressCallbacks } from '../progress.js';
import { attachDebateRenderer } from '../render.js';
import { createContext, reportError, withStore, writeOutputFile } from '../utils.js';

interface DebateOptions {
  topic: string;
  description: string;
  lineup?: string;
  timeout?: number;
  output?: string;
}

export async function debateCommand(options: DebateOptions, command: Command): Promise<void> {
  try {
    const ctx = createContext(command);
    const topic = createTopic({ title: options.topic, description: options.description });
    const lineup = options.lineup ?? ctx.config.agents.lineup;
    const agents = buildLineup(lineup, {
      ...ctx.config.agents,
      timeoutSeconds: options.timeout ?? ctx.config.agents.timeoutSeconds,
    });

    console.error(chalk.cyan(`\nStarting debate: ${topic.title}`));
    console.error(chalk.gray(`  Description: ${topic.description}`));
    console.error(chalk.gray(`  Lineup: ${lineup} (${agents.map((a) => a.name).join(', ')})`));

    const record = await withStore(ctx, async (store) => {
      const runner = new AgentRunner({
        providers: ctx.config.providers,
        cwd: ctx.projectDir,
        logger: ctx.logger,
        ...(ctx.verbose ? createProgressCallbacks() : {}),
      });
      const orchestrator = new DebateOrchestrator({ runner, store, logger: ctx.logger });
      const detach = attachDebateRenderer(orchestrator.events);
      try {
        return await orchestrator.runDebate(topic, agents);
      } finally {
        detach();
      }
    }).catch((error: unknown) => {
      if (error instanceof DebatePersistenceError) {
        // The debate ran; show it before reporting the storage failure
        console.log(formatDebateText(error.record));
      }
      throw error;
    });

    printDebate(record, options.output ? resolve(ctx.projectDir, options.output) : undefined);
  } catch (error) {
    reportError(error);
  }
}

function printDebate(record: DebateRecord, outputPath: string | undefined): void {
  const text = formatDebateText(record);
  console.log(text);

  if (outputPath) {
    writeOutputFile(outputPath, text);
    console.log(chalk.green(`\nDebate saved to ${outputPath}`));
  }

  console.log(`\nDebate ID: ${record.debateId}`);
  console.log(chalk.gray('Use this ID to view or export the debate later'));
}
