// packages/core/src/utils/index.ts -- barrel re-export

export { generateDebateId } from './id.js';
export {
  AgentExecutionError,
  ConfigError,
  DebateNotFoundError,
  DebatePersistenceError,
  StorageError,
  errorMessage,
} from './errors.js';
export type { AgentFailureKind } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
