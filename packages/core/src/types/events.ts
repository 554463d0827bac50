// packages/core/src/types/events.ts

import type { AgentResponse, DebateRole } from './debate.js';

/**
 * Progress events emitted by the orchestrator while a debate runs.
 * Type names are dot-separated, consumed by the CLI renderer.
 */

// -- Debate lifecycle --
export interface DebateStartedEvent {
  type: 'debate.started';
  topicTitle: string;
  timestamp: string;
}

export interface DebateCompletedEvent {
  type: 'debate.completed';
  debateId: string;
  totalExecutionTimeMs: number;
  failedStages: DebateRole[];
  timestamp: string;
}

export interface DebatePersistFailedEvent {
  type: 'debate.persist_failed';
  debateId: string;
  error: string;
  timestamp: string;
}

// -- Stage events --
export interface StageStartedEvent {
  type: 'stage.started';
  role: DebateRole;
  agentName: string;
  modelId: string;
  /** 1-based position in the debate */
  stage: number;
  timestamp: string;
}

export interface StageCompletedEvent {
  type: 'stage.completed';
  role: DebateRole;
  stage: number;
  response: AgentResponse;
  timestamp: string;
}

export type DebateEvent =
  | DebateStartedEvent
  | DebateCompletedEvent
  | DebatePersistFailedEvent
  | StageStartedEvent
  | StageCompletedEvent;

export type DebateEventType = DebateEvent['type'];
