// packages/core/src/utils/errors.ts

import type { DebateRecord } from '../types/debate.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type AgentFailureKind = 'timeout' | 'not-found' | 'failed';

export class AgentExecutionError extends Error {
  constructor(
    message: string,
    public readonly kind: AgentFailureKind,
    public readonly elapsedMs: number,
    public readonly provider?: string,
    public readonly model?: string,
  ) {
    super(message);
    this.name = 'AgentExecutionError';
  }

  get isTimeout(): boolean {
    return this.kind === 'timeout';
  }

  get isNotFound(): boolean {
    return this.kind === 'not-found';
  }
}

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class DebateNotFoundError extends StorageError {
  constructor(public readonly debateId: string) {
    super(`Debate ${debateId} not found`, 'get');
    this.name = 'DebateNotFoundError';
  }
}

/**
 * The debate ran to completion but the store rejected it.
 * The finished record stays reachable through `record`.
 */
export class DebatePersistenceError extends StorageError {
  constructor(
    public readonly record: DebateRecord,
    cause: unknown,
  ) {
    super(
      `Debate ${record.debateId} completed but could not be saved: ${cause instanceof Error ? cause.message : String(cause)}`,
      'save',
    );
    this.name = 'DebatePersistenceError';
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
