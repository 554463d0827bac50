import { describe, expect, it, vi } from 'vitest';
import { failedResponse, succeededResponse } from '../../../src/agents/responses.js';
import type { AgentExecutor } from '../../../src/agents/runner.js';
import { DebateOrchestrator } from '../../../src/engine/orchestrator.js';
import { buildAgainstPrompt, buildForPrompt, buildSynthesisPrompt } from '../../../src/prompts/debate-prompts.js';
import type { DebateRecordStore } from '../../../src/storage/store.js';
import type { AgentConfig, AgentResponse, DebateRecord } from '../../../src/types/debate.js';
import type { DebateEvent } from '../../../src/types/events.js';
import {
  ConfigError,
  DebateNotFoundError,
  DebatePersistenceError,
  StorageError,
} from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';
import { TOPIC, agentConfig, threeConfigs } from '../../helpers/fixtures.js';

class MemoryStore implements DebateRecordStore {
  readonly records = new Map<string, DebateRecord>();
  private readonly order: string[] = [];

  save(record: DebateRecord): string {
    this.records.set(record.debateId, record);
    this.order.push(record.debateId);
    return record.debateId;
  }

  get(debateId: string): DebateRecord {
    const record = this.records.get(debateId);
    if (!record) throw new DebateNotFoundError(debateId);
    return record;
  }

  list(limit: number): DebateRecord[] {
    return [...this.order]
      .reverse()
      .slice(0, limit)
      .flatMap((id) => {
        const record = this.records.get(id);
        return record ? [record] : [];
      });
  }

  delete(debateId: string): boolean {
    return this.records.delete(debateId);
  }
}

interface Call {
  config: AgentConfig;
  prompt: string;
}

/** Answers `<role>:<prompt length>` and remembers every call. */
class EchoExecutor implements AgentExecutor {
  readonly calls: Call[] = [];

  constructor(private readonly respond?: (config: AgentConfig, prompt: string) => Promise<AgentResponse>) {}

  async execute(config: AgentConfig, prompt: string): Promise<AgentResponse> {
    this.calls.push({ config, prompt });
    if (this.respond) return this.respond(config, prompt);
    return succeededResponse(config, `${config.role}:${prompt.length}`, 5);
  }
}

const quiet = createLogger('silent');

function setup(executor = new EchoExecutor(), store: DebateRecordStore = new MemoryStore()) {
  const orchestrator = new DebateOrchestrator({
    runner: executor,
    store,
    logger: quiet,
    generateId: () => 'deb_fixed',
    now: () => new Date('2025-06-01T12:00:00.000Z'),
  });
  return { orchestrator, executor, store };
}

describe('DebateOrchestrator.runDebate', () => {
  it('runs FOR, AGAINST, SYNTHESIS regardless of input order', async () => {
    const { orchestrator, executor } = setup();
    const configs = [agentConfig('SYNTHESIS'), agentConfig('FOR'), agentConfig('AGAINST')];

    const record = await orchestrator.runDebate(TOPIC, configs);

    expect(executor.calls.map((c) => c.config.role)).toEqual(['FOR', 'AGAINST', 'SYNTHESIS']);
    expect(record.agentResponses.map((r) => r.role)).toEqual(['FOR', 'AGAINST', 'SYNTHESIS']);
    expect(record.agentsConfig.map((c) => c.role)).toEqual(['SYNTHESIS', 'FOR', 'AGAINST']);
  });

  it('threads each stage output into the next prompt', async () => {
    const { orchestrator, executor } = setup();
    await orchestrator.runDebate(TOPIC, threeConfigs());

    const [forCall, againstCall, synthesisCall] = executor.calls;
    const forText = `FOR:${buildForPrompt(TOPIC).length}`;
    const againstPrompt = buildAgainstPrompt(TOPIC, forText);
    const againstText = `AGAINST:${againstPrompt.length}`;

    expect(forCall?.prompt).toBe(buildForPrompt(TOPIC));
    expect(againstCall?.prompt).toBe(againstPrompt);
    expect(synthesisCall?.prompt).toBe(buildSynthesisPrompt(TOPIC, forText, againstText));
    expect(synthesisCall?.prompt).toContain(forText);
    expect(synthesisCall?.prompt).toContain(againstText);
  });

  it('grows each prompt by at least the text it embeds', async () => {
    const { orchestrator, executor } = setup();
    const record = await orchestrator.runDebate(TOPIC, threeConfigs());

    const [forResponse, againstResponse] = record.agentResponses;
    const [forCall, againstCall, synthesisCall] = executor.calls;
    if (!forCall || !againstCall || !synthesisCall) throw new Error('expected three agent calls');
    expect(againstCall.prompt.length - forCall.prompt.length).toBeGreaterThanOrEqual(
      forResponse.responseText.length,
    );
    expect(synthesisCall.prompt.length - againstCall.prompt.length).toBeGreaterThanOrEqual(
      againstResponse.responseText.length,
    );
  });

  it('assembles and saves a frozen record', async () => {
    const { orchestrator, store } = setup();
    const record = await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(record.debateId).toBe('deb_fixed');
    expect(record.createdAt).toBe('2025-06-01T12:00:00.000Z');
    expect(record.topic).toBe(TOPIC);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.agentResponses)).toBe(true);
    expect(store.get('deb_fixed')).toBe(record);
  });

  it('generates deb_ identifiers by default', async () => {
    const orchestrator = new DebateOrchestrator({
      runner: new EchoExecutor(),
      store: new MemoryStore(),
      logger: quiet,
    });
    const first = await orchestrator.runDebate(TOPIC, threeConfigs());
    const second = await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(first.debateId).toMatch(/^deb_[A-Za-z0-9_-]{21}$/);
    expect(second.debateId).not.toBe(first.debateId);
    expect(Number.isNaN(Date.parse(first.createdAt))).toBe(false);
  });

  it('measures total time across all stages', async () => {
    const executor = new EchoExecutor(async (config) => {
      const start = performance.now();
      await new Promise((resolve) => setTimeout(resolve, 15));
      return succeededResponse(config, config.role, performance.now() - start);
    });
    const { orchestrator } = setup(executor);
    const record = await orchestrator.runDebate(TOPIC, threeConfigs());

    const stageTimes = record.agentResponses.map((r) => r.executionTimeMs);
    expect(record.totalExecutionTimeMs).toBeGreaterThanOrEqual(Math.max(...stageTimes));
  });

  it.each([
    ['two agents', () => [agentConfig('FOR'), agentConfig('AGAINST')], 'Debate requires exactly 3 agents, got 2'],
    [
      'four agents',
      () => [...threeConfigs(), agentConfig('FOR', { name: 'Extra' })],
      'Debate requires exactly 3 agents, got 4',
    ],
    [
      'a duplicate role',
      () => [agentConfig('FOR'), agentConfig('FOR', { name: 'Second FOR' }), agentConfig('SYNTHESIS')],
      'Duplicate agent role FOR. Got: FOR, FOR, SYNTHESIS',
    ],
    ['no agents', () => [], 'Debate requires exactly 3 agents, got 0'],
  ])('rejects %s before launching any agent', async (_label, build, message) => {
    const { orchestrator, executor, store } = setup();

    await expect(orchestrator.runDebate(TOPIC, build())).rejects.toThrow(ConfigError);
    await expect(orchestrator.runDebate(TOPIC, build())).rejects.toThrow(message);
    expect(executor.calls).toHaveLength(0);
    expect(store.list(10)).toEqual([]);
  });

  it('continues after a failed FOR stage with its empty text', async () => {
    const executor = new EchoExecutor(async (config, prompt) =>
      config.role === 'FOR'
        ? failedResponse(config, 'Agent Claude FOR timed out after 60s', 60000)
        : succeededResponse(config, `${config.role}:${prompt.length}`, 5),
    );
    const { orchestrator, store } = setup(executor);
    const record = await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(executor.calls).toHaveLength(3);
    expect(executor.calls[1]?.prompt).toBe(buildAgainstPrompt(TOPIC, ''));
    expect(record.agentResponses[0]).toMatchObject({
      success: false,
      errorMessage: 'Agent Claude FOR timed out after 60s',
    });
    expect(record.agentResponses[1].success).toBe(true);
    expect(record.agentResponses[2].success).toBe(true);
    expect(store.list(10)).toHaveLength(1);
  });

  it('records a failed response when an executor rejects', async () => {
    const executor = new EchoExecutor(async (config) => {
      if (config.role === 'AGAINST') throw new Error('executor crashed');
      return succeededResponse(config, 'ok', 1);
    });
    const { orchestrator } = setup(executor);
    const record = await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(record.agentResponses[1]).toMatchObject({
      role: 'AGAINST',
      success: false,
      errorMessage: 'executor crashed',
      executionTimeMs: 0,
      responseText: '',
    });
    expect(record.agentResponses[2].success).toBe(true);
  });

  it('raises DebatePersistenceError carrying the finished record when saving fails', async () => {
    const store = new MemoryStore();
    vi.spyOn(store, 'save').mockImplementation(() => {
      throw new StorageError('disk full', 'save');
    });
    const { orchestrator, executor } = setup(new EchoExecutor(), store);
    const events: DebateEvent[] = [];
    orchestrator.events.on('event', (e) => events.push(e));

    let caught: unknown;
    try {
      await orchestrator.runDebate(TOPIC, threeConfigs());
    } catch (err) {
      caught = err;
    }

    expect(executor.calls).toHaveLength(3);
    expect(caught).toBeInstanceOf(DebatePersistenceError);
    expect(caught).toBeInstanceOf(StorageError);
    if (!(caught instanceof DebatePersistenceError)) return;
    expect(caught.message).toBe('Debate deb_fixed completed but could not be saved: disk full');
    expect(caught.record.debateId).toBe('deb_fixed');
    expect(caught.record.agentResponses.map((r) => r.responseText)).toEqual(
      executor.calls.map((c) => `${c.config.role}:${c.prompt.length}`),
    );
    expect(events.at(-1)).toMatchObject({ type: 'debate.persist_failed', debateId: 'deb_fixed', error: 'disk full' });
  });

  it('emits progress events in order', async () => {
    const { orchestrator } = setup();
    const events: DebateEvent[] = [];
    orchestrator.events.on('event', (e) => events.push(e));

    await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(events.map((e) => e.type)).toEqual([
      'debate.started',
      'stage.started',
      'stage.completed',
      'stage.started',
      'stage.completed',
      'stage.started',
      'stage.completed',
      'debate.completed',
    ]);
    expect(events[1]).toMatchObject({
      type: 'stage.started',
      role: 'FOR',
      stage: 1,
      agentName: 'Claude FOR',
      modelId: 'claude-haiku-4-5-20251001',
    });
    expect(events.at(-1)).toMatchObject({ type: 'debate.completed', debateId: 'deb_fixed', failedStages: [] });
  });
});

describe('DebateOrchestrator queries', () => {
  it('gets, lists and deletes through the store', async () => {
    let n = 0;
    const orchestrator = new DebateOrchestrator({
      runner: new EchoExecutor(),
      store: new MemoryStore(),
      logger: quiet,
      generateId: () => `deb_${++n}`,
    });
    await orchestrator.runDebate(TOPIC, threeConfigs());
    await orchestrator.runDebate(TOPIC, threeConfigs());

    expect(orchestrator.getDebate('deb_1').debateId).toBe('deb_1');
    expect(orchestrator.listDebates().map((d) => d.debateId)).toEqual(['deb_2', 'deb_1']);
    expect(orchestrator.listDebates(1).map((d) => d.debateId)).toEqual(['deb_2']);
    expect(orchestrator.deleteDebate('deb_1')).toBe(true);
    expect(() => orchestrator.getDebate('deb_1')).toThrow(DebateNotFoundError);
  });
});
