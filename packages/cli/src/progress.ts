// packages/cli/src/progress.ts -- Subprocess diagnostics shown with --verbose

import type { ProgressCallbacks } from '@threefold/core';
import chalk from 'chalk';

const MAX_STDERR_LINE = 200;

/**
 * Progress callbacks that report agent subprocess activity on stderr.
 */
export function createProgressCallbacks(label = 'agent'): ProgressCallbacks {
  return {
    onSpawn(pid: number, command: string) {
      // Keep only the executable's basename
      const exe = command.split(/[/\\]+/).pop() ?? command;
      console.error(chalk.dim(`  [${label}] Started (PID: ${pid}, cmd: ${exe})`));
    },

    onStderr(chunk: string) {
      for (const line of chunk.split('\n')) {
        const trimmed = line.trim();
        if (trimmed) {
          console.error(chalk.dim(`  [${label}] ${trimmed.slice(0, MAX_STDERR_LINE)}`));
        }
      }
    },
  };
}
