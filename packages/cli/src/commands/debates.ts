// packages/cli/src/commands/debates.ts -- Browse, export and delete stored debates

import { resolve } from 'node:path';

import type { DebateFormat } from '@threefold/core';
import { DebateNotFoundError, formatDebate, formatDebateList } from '@threefold/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createContext, reportError, withStore, writeOutputFile } from '../utils.js';

// ── threefold debates list ──

interface ListOptions {
  limit: number;
}

export async function debatesListCommand(options: ListOptions, command: Command): Promise<void> {
  try {
    const ctx = createContext(command);
    const debates = await withStore(ctx, (store) => store.list(options.limit));
    if (debates.length === 0) {
      console.log('No debates stored yet. Run one with: threefold debate --topic ... --description ...');
      return;
    }
    console.log(formatDebateList(debates));
  } catch (error) {
    reportError(error);
  }
}

// ── threefold debates view ──

interface ViewOptions {
  format: DebateFormat;
}

export async function debatesViewCommand(
  debateId: string,
  options: ViewOptions,
  command: Command,
): Promise<void> {
  try {
    const ctx = createContext(command);
    const debate = await withStore(ctx, (store) => store.get(debateId));
    console.log(formatDebate(debate, options.format));
  } catch (error) {
    reportLookupError(debateId, error);
  }
}

// ── threefold debates export ──

interface ExportOptions {
  output: string;
  format: DebateFormat;
}

export async function debatesExportCommand(
  debateId: string,
  options: ExportOptions,
  command: Command,
): Promise<void> {
  try {
    const ctx = createContext(command);
    const debate = await withStore(ctx, (store) => store.get(debateId));
    const outputPath = resolve(ctx.projectDir, options.output);
    writeOutputFile(outputPath, formatDebate(debate, options.format));
    console.log(chalk.green(`Debate exported to ${outputPath}`));
  } catch (error) {
    reportLookupError(debateId, error);
  }
}

// ── threefold debates delete ──

export async function debatesDeleteCommand(
  debateId: string,
  _options: Record<string, never>,
  command: Command,
): Promise<void> {
  try {
    const ctx = createContext(command);
    const deleted = await withStore(ctx, (store) => store.delete(debateId));
    if (!deleted) {
      throw new DebateNotFoundError(debateId);
    }
    console.log(chalk.green(`Deleted debate ${debateId}`));
  } catch (error) {
    reportLookupError(debateId, error);
  }
}

function reportLookupError(debateId: string, error: unknown): void {
  if (error instanceof DebateNotFoundError) {
    console.error(chalk.red(`Debate '${debateId}' not found`));
    process.exitCode = 1;
    return;
  }
  reportError(error);
}
