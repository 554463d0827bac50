// packages/core/src/agents/cli-agent.ts -- Agent backed by a provider CLI subprocess

import type { AgentConfig, AgentResponse } from '../types/debate.js';
import { STDERR_LOG_CHARS } from '../utils/constants.js';
import { AgentExecutionError, ConfigError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import type { ProgressCallbacks } from './process.js';
import { buildFilteredEnv, runProcess } from './process.js';
import type { ProviderSpec } from './providers.js';
import { PROVIDER_SPECS } from './providers.js';
import { failedResponse, succeededResponse } from './responses.js';

/** One debate participant. `execute` never rejects. */
export interface Agent {
  readonly config: AgentConfig;
  execute(prompt: string): Promise<AgentResponse>;
}

export interface CliAgentOptions extends ProgressCallbacks {
  /** Executable path, replacing the provider's default command. */
  command?: string;
  /** Child environment. Default: filtered process.env plus the provider's auth vars. */
  env?: Record<string, string>;
  cwd?: string;
  logger?: Logger;
}

export class CliAgent implements Agent {
  private readonly command: string;
  private readonly logger: Logger;

  constructor(
    readonly config: AgentConfig,
    private readonly provider: ProviderSpec,
    private readonly options: CliAgentOptions = {},
  ) {
    this.command = options.command ?? provider.command;
    this.logger = (options.logger ?? createLogger('warn')).child(config.name);
  }

  async execute(prompt: string): Promise<AgentResponse> {
    const { config } = this;
    try {
      const args = this.provider.buildArgs(config.modelId, prompt);
      this.logger.debug(`Running ${this.command} (${config.modelId}, prompt ${prompt.length} chars)`);

      const result = await runProcess(this.command, args, {
        timeoutMs: config.timeoutSeconds * 1000,
        env: this.options.env ?? buildFilteredEnv(this.provider.authEnv),
        cwd: this.options.cwd,
        onSpawn: this.options.onSpawn,
        onStderr: this.options.onStderr,
      });

      if (result.exitCode !== 0) {
        this.logger.warn(
          `${this.command} exited with code ${result.exitCode}: ${result.stderr.slice(0, STDERR_LOG_CHARS)}`,
        );
      }

      const text = this.provider.sanitizeOutput(result.stdout);
      this.logger.debug(`Completed in ${result.durationMs}ms (${text.length} chars)`);
      return succeededResponse(config, text, result.durationMs);
    } catch (err) {
      if (err instanceof AgentExecutionError) {
        if (err.isTimeout) {
          const message = `Agent ${config.name} timed out after ${config.timeoutSeconds}s`;
          this.logger.warn(message);
          return failedResponse(config, message, err.elapsedMs);
        }
        this.logger.warn(err.message);
        return failedResponse(config, err.message, err.isNotFound ? 0 : err.elapsedMs);
      }
      const message = errorMessage(err);
      this.logger.error(`Unexpected agent failure: ${message}`);
      return failedResponse(config, message, 0);
    }
  }
}

/** Factory keyed on the config's provider. */
export function createAgent(config: AgentConfig, options?: CliAgentOptions): Agent {
  const provider = Object.hasOwn(PROVIDER_SPECS, config.provider) ? PROVIDER_SPECS[config.provider] : undefined;
  if (!provider) {
    throw new ConfigError(`Unknown provider: ${String(config.provider)}`, 'provider');
  }
  return new CliAgent(config, provider, options);
}
