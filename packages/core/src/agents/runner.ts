// packages/core/src/agents/runner.ts -- Turns (config, prompt) into an AgentResponse

import type { AgentConfig, AgentProvider, AgentResponse } from '../types/debate.js';
import type { ProvidersConfig } from '../types/config.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { CliAgentOptions } from './cli-agent.js';
import { createAgent } from './cli-agent.js';
import type { ProgressCallbacks } from './process.js';
import { failedResponse } from './responses.js';

/** What the orchestrator needs from an agent runner. */
export interface AgentExecutor {
  execute(config: AgentConfig, prompt: string): Promise<AgentResponse>;
}

export interface AgentRunnerOptions extends ProgressCallbacks {
  /** Per-provider executable overrides. */
  providers?: Partial<ProvidersConfig>;
  env?: Record<string, string>;
  cwd?: string;
  logger?: Logger;
}

export class AgentRunner implements AgentExecutor {
  constructor(private readonly options: AgentRunnerOptions = {}) {}

  async execute(config: AgentConfig, prompt: string): Promise<AgentResponse> {
    try {
      const agent = createAgent(config, this.agentOptions(config.provider));
      return await agent.execute(prompt);
    } catch (err) {
      // createAgent rejects unknown providers; still a per-stage failure
      return failedResponse(config, errorMessage(err), 0);
    }
  }

  private agentOptions(provider: AgentProvider): CliAgentOptions {
    return {
      command: this.options.providers?.[provider]?.command,
      env: this.options.env,
      cwd: this.options.cwd,
      logger: this.options.logger,
      onSpawn: this.options.onSpawn,
      onStderr: this.options.onStderr,
    };
  }
}
