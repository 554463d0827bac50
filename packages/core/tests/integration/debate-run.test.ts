import { EventEmitter } from 'node:events';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
  execFile: vi.fn(),
}));

import { spawn } from 'node:child_process';
import { AgentRunner } from '../../src/agents/runner.js';
import { buildLineup } from '../../src/config/lineups.js';
import { DebateOrchestrator } from '../../src/engine/orchestrator.js';
import { JsonFileDebateStore } from '../../src/storage/json-file-store.js';
import { createLogger } from '../../src/utils/logger.js';
import { TOPIC } from '../helpers/fixtures.js';

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly pid = 99;
  readonly kill = vi.fn(() => true);
}

type Script = (command: string, args: readonly string[]) => { stdout: string } | { errorCode: string };

/** Every spawned agent answers on the next tick according to `script`. */
function scriptAgents(script: Script): void {
  vi.mocked(spawn).mockImplementation(((command: string, args: readonly string[]) => {
    const child = new FakeChild();
    setImmediate(() => {
      const outcome = script(command, args);
      if ('errorCode' in outcome) {
        child.emit('error', Object.assign(new Error(`spawn ${command} ${outcome.errorCode}`), { code: outcome.errorCode }));
        return;
      }
      child.emit('spawn');
      child.stdout.emit('data', Buffer.from(outcome.stdout));
      child.emit('close', 0);
    });
    return child;
  }) as never);
}

const lastArg = (args: readonly string[]): string => args[args.length - 1] ?? '';

let dir: string;

beforeEach(() => {
  vi.clearAllMocks();
  dir = mkdtempSync(join(tmpdir(), 'threefold-run-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function createOrchestrator() {
  const logger = createLogger('silent');
  const store = new JsonFileDebateStore({ dir });
  const orchestrator = new DebateOrchestrator({ runner: new AgentRunner({ logger }), store, logger });
  return { orchestrator, store };
}

describe('mixed-lineup debate end to end', () => {
  it('threads claude and gemini output through all three stages and saves the record', async () => {
    scriptAgents((command, args) =>
      command === 'gemini'
        ? { stdout: `Loaded cached credentials.\ngemini read ${lastArg(args).length} chars\n` }
        : { stdout: `claude read ${lastArg(args).length} chars\n` },
    );
    const { orchestrator, store } = createOrchestrator();

    const record = await orchestrator.runDebate(TOPIC, buildLineup('mixed'));

    const calls = vi.mocked(spawn).mock.calls;
    expect(calls.map((c) => c[0])).toEqual(['claude', 'gemini', 'claude']);
    const againstPrompt = lastArg(calls[1]?.[1] ?? []);
    const synthesisPrompt = lastArg(calls[2]?.[1] ?? []);

    const [forResponse, againstResponse, synthesisResponse] = record.agentResponses;
    expect(forResponse.responseText).toMatch(/^claude read \d+ chars$/);
    expect(againstResponse.responseText).toBe(`gemini read ${againstPrompt.length} chars`);
    expect(synthesisResponse.responseText).toBe(`claude read ${synthesisPrompt.length} chars`);
    expect(againstPrompt).toContain(forResponse.responseText);
    expect(synthesisPrompt).toContain(againstResponse.responseText);
    expect(record.agentResponses.every((r) => r.success)).toBe(true);

    expect(store.get(record.debateId)).toEqual(record);
    const index: unknown = JSON.parse(readFileSync(join(dir, '_index.json'), 'utf-8'));
    expect(index).toEqual([{ id: record.debateId, created_at: record.createdAt, topic_title: 'Remote work' }]);
  });

  it('keeps going when one provider CLI is missing', async () => {
    scriptAgents((command, args) =>
      command === 'gemini' ? { errorCode: 'ENOENT' } : { stdout: `claude read ${lastArg(args).length} chars` },
    );
    const { orchestrator, store } = createOrchestrator();

    const record = await orchestrator.runDebate(TOPIC, buildLineup('mixed'));

    expect(record.agentResponses.map((r) => r.success)).toEqual([true, false, true]);
    expect(record.agentResponses[1]).toMatchObject({
      errorMessage: 'CLI command not found: gemini',
      executionTimeMs: 0,
      responseText: '',
    });
    const synthesisPrompt = lastArg(vi.mocked(spawn).mock.calls[2]?.[1] ?? []);
    expect(synthesisPrompt).toContain('ARGUMENT AGAINST:\n---\n\n---');
    expect(store.list(10)).toHaveLength(1);
  });
});
