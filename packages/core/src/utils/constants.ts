// packages/core/src/utils/constants.ts -- Shared defaults

/** Default per-agent timeout in seconds */
export const DEFAULT_TIMEOUT_SEC = 60;

/** Default sampling temperature */
export const DEFAULT_TEMPERATURE = 0.7;

/** Default max output tokens per agent */
export const DEFAULT_MAX_TOKENS = 2000;

/** Default number of debates returned by list */
export const DEFAULT_LIST_LIMIT = 10;

/** Stderr kept per agent call for diagnostics */
export const STDERR_CAPTURE_CHARS = 10_000;

/** Stderr excerpt written to the log on non-zero exit */
export const STDERR_LOG_CHARS = 500;

/** Wait for a killed agent to exit before settling its timeout anyway */
export const KILL_GRACE_MS = 500;

/** Project config file name */
export const CONFIG_FILENAME = '.threefold.yml';

/** Project data directory */
export const DATA_DIRNAME = '.threefold';
