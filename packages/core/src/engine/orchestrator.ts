// packages/core/src/engine/orchestrator.ts -- FOR -> AGAINST -> SYNTHESIS with context passing

import { failedResponse } from '../agents/responses.js';
import type { AgentExecutor } from '../agents/runner.js';
import {
  buildAgainstPrompt,
  buildForPrompt,
  buildSynthesisPrompt,
} from '../prompts/debate-prompts.js';
import type { DebateRecordStore } from '../storage/store.js';
import type {
  AgentConfig,
  AgentResponse,
  DebateRecord,
  DebateTopic,
  StageResponses,
} from '../types/debate.js';
import { DEFAULT_LIST_LIMIT } from '../utils/constants.js';
import { DebatePersistenceError, errorMessage } from '../utils/errors.js';
import { generateDebateId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { EventBus } from './event-bus.js';
import { sortByExecutionOrder } from './validation.js';

export interface DebateOrchestratorOptions {
  runner: AgentExecutor;
  store: DebateRecordStore;
  logger?: Logger;
  /** Receives progress events. A private bus is created when omitted. */
  events?: EventBus;
  /** Injected for tests. */
  generateId?: () => string;
  now?: () => Date;
}

export class DebateOrchestrator {
  readonly events: EventBus;
  private readonly runner: AgentExecutor;
  private readonly store: DebateRecordStore;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: DebateOrchestratorOptions) {
    this.runner = options.runner;
    this.store = options.store;
    this.logger = (options.logger ?? createLogger('warn')).child('orchestrator');
    this.events = options.events ?? new EventBus();
    this.generateId = options.generateId ?? generateDebateId;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the three stages in order and persist the record.
   *
   * A failed stage does not stop the debate: its (usually empty) text is
   * still handed to the stages after it. Invalid configs throw ConfigError
   * before any agent starts; a store failure throws DebatePersistenceError
   * carrying the finished record.
   */
  async runDebate(topic: DebateTopic, agentsConfig: readonly AgentConfig[]): Promise<DebateRecord> {
    const [forConfig, againstConfig, synthesisConfig] = sortByExecutionOrder(agentsConfig);

    this.logger.info(`Starting debate "${topic.title}"`);
    this.events.emitEvent({ type: 'debate.started', topicTitle: topic.title, timestamp: this.timestamp() });

    const start = performance.now();

    const forResponse = await this.runStage(1, forConfig, buildForPrompt(topic));

    const againstResponse = await this.runStage(
      2,
      againstConfig,
      buildAgainstPrompt(topic, forResponse.responseText),
    );

    const synthesisResponse = await this.runStage(
      3,
      synthesisConfig,
      buildSynthesisPrompt(topic, forResponse.responseText, againstResponse.responseText),
    );

    const totalExecutionTimeMs = performance.now() - start;

    const agentResponses: StageResponses = [forResponse, againstResponse, synthesisResponse];
    const record: DebateRecord = Object.freeze({
      debateId: this.generateId(),
      topic,
      agentsConfig: Object.freeze([...agentsConfig]),
      agentResponses: Object.freeze(agentResponses),
      totalExecutionTimeMs,
      createdAt: this.timestamp(),
    });

    try {
      this.store.save(record);
    } catch (err) {
      this.logger.error(`Failed to persist debate ${record.debateId}: ${errorMessage(err)}`);
      this.events.emitEvent({
        type: 'debate.persist_failed',
        debateId: record.debateId,
        error: errorMessage(err),
        timestamp: this.timestamp(),
      });
      throw new DebatePersistenceError(record, err);
    }

    const failedStages = agentResponses.filter((r) => !r.success).map((r) => r.role);
    this.logger.info(
      `Debate ${record.debateId} completed in ${Math.round(totalExecutionTimeMs)}ms` +
        (failedStages.length > 0 ? ` (failed stages: ${failedStages.join(', ')})` : ''),
    );
    this.events.emitEvent({
      type: 'debate.completed',
      debateId: record.debateId,
      totalExecutionTimeMs,
      failedStages,
      timestamp: this.timestamp(),
    });
    return record;
  }

  /** Throws DebateNotFoundError when absent. */
  getDebate(debateId: string): DebateRecord {
    return this.store.get(debateId);
  }

  listDebates(limit: number = DEFAULT_LIST_LIMIT): DebateRecord[] {
    return this.store.list(limit);
  }

  deleteDebate(debateId: string): boolean {
    return this.store.delete(debateId);
  }

  private async runStage(stage: number, config: AgentConfig, prompt: string): Promise<AgentResponse> {
    this.events.emitEvent({
      type: 'stage.started',
      role: config.role,
      agentName: config.name,
      modelId: config.modelId,
      stage,
      timestamp: this.timestamp(),
    });

    let response: AgentResponse;
    try {
      response = await this.runner.execute(config, prompt);
    } catch (err) {
      // AgentRunner never rejects, but a custom executor might
      response = failedResponse(config, errorMessage(err), 0);
    }

    if (response.success) {
      this.logger.debug(`${config.role} (${config.name}) done in ${Math.round(response.executionTimeMs)}ms`);
    } else {
      this.logger.warn(`${config.role} (${config.name}) failed: ${response.errorMessage}`);
    }
    this.events.emitEvent({
      type: 'stage.completed',
      role: config.role,
      stage,
      response,
      timestamp: this.timestamp(),
    });
    return response;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
