// packages/core/src/config/defaults.ts

import { join } from 'node:path';
import type { ProjectConfig } from '../types/config.js';
import {
  DATA_DIRNAME,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SEC,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  storage: {
    backend: 'json',
    dir: join(DATA_DIRNAME, 'debates'),
    dbPath: join(DATA_DIRNAME, 'db', 'threefold.db'),
  },
  agents: {
    lineup: 'mixed',
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    timeoutSeconds: DEFAULT_TIMEOUT_SEC,
  },
  providers: {
    claude: { command: 'claude' },
    gemini: { command: 'gemini' },
  },
  advanced: {
    logLevel: 'warn',
  },
};
