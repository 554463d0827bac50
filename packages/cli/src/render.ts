// packages/cli/src/render.ts -- Terminal rendering for debate progress events

import type { DebateEvent, DebateRole, EventBus } from '@threefold/core';
import { formatMs } from '@threefold/core';
import chalk from 'chalk';
import ora from 'ora';
import type { Color, Ora } from 'ora';

const roleColors: Record<DebateRole, { text: (text: string) => string; spinner: Color }> = {
  FOR: { text: chalk.green, spinner: 'green' },
  AGAINST: { text: chalk.red, spinner: 'red' },
  SYNTHESIS: { text: chalk.blue, spinner: 'blue' },
};

/**
 * Render debate events with one spinner per stage. Returns a function that
 * detaches the renderer and stops any spinner still running.
 */
export function attachDebateRenderer(events: EventBus): () => void {
  let activeSpinner: Ora | null = null;

  const onEvent = (event: DebateEvent): void => {
    switch (event.type) {
      case 'debate.started':
        console.error(chalk.gray(`\n━━━ Debate: ${event.topicTitle} ━━━`));
        break;

      case 'stage.started': {
        const color = roleColors[event.role];
        activeSpinner = ora({
          text: color.text(`[${event.stage}/3] ${event.role} ${event.agentName} (${event.modelId})...`),
          color: color.spinner,
          stream: process.stderr,
        }).start();
        break;
      }

      case 'stage.completed': {
        const { response } = event;
        const summary = `[${event.stage}/3] ${event.role} ${response.agentName} (${formatMs(response.executionTimeMs)})`;
        if (response.success) {
          activeSpinner?.succeed(summary);
        } else {
          activeSpinner?.fail(`${summary}: ${response.errorMessage}`);
        }
        activeSpinner = null;
        break;
      }

      case 'debate.completed':
        if (event.failedStages.length > 0) {
          console.error(chalk.yellow(`  Failed stages: ${event.failedStages.join(', ')}`));
        }
        console.error(chalk.gray(`━━━ Completed in ${formatMs(event.totalExecutionTimeMs)} ━━━\n`));
        break;

      case 'debate.persist_failed':
        console.error(chalk.red(`  Could not save debate ${event.debateId}: ${event.error}`));
        break;
    }
  };

  events.on('event', onEvent);
  return () => {
    events.off('event', onEvent);
    activeSpinner?.stop();
    activeSpinner = null;
  };
}
