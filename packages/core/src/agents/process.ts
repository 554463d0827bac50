// packages/core/src/agents/process.ts -- One child process per agent call, bounded by a timeout

import type { ChildProcess } from 'node:child_process';
import { spawn } from 'node:child_process';
import { KILL_GRACE_MS, STDERR_CAPTURE_CHARS } from '../utils/constants.js';
import { AgentExecutionError } from '../utils/errors.js';

// Default env vars always passed to agent subprocesses
const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'COMSPEC',
  'SHELL',
  'LANG',
  'TERM',
];

/** Progress callbacks for diagnostics while a subprocess runs. */
export interface ProgressCallbacks {
  /** Called when the subprocess successfully spawns. */
  onSpawn?: (pid: number, command: string) => void;
  /** Called on each stderr chunk. */
  onStderr?: (chunk: string) => void;
}

export interface RunProcessOptions extends ProgressCallbacks {
  timeoutMs: number;
  env?: Record<string, string>;
  cwd?: string;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
}

/**
 * Run `command` with `args` and collect its output.
 *
 * The child leads its own process group on POSIX, so a timeout kills
 * everything it started. Rejects with AgentExecutionError:
 * - `timeout` once `timeoutMs` passes; the group is SIGKILLed and the
 *   promise settles when the direct child exits, or after KILL_GRACE_MS
 *   if it has not, without waiting for inherited pipes to close
 * - `not-found` when the executable cannot be located
 * - `failed` for any other spawn error
 *
 * A non-zero exit code is not a failure here.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions,
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const start = performance.now();
    const elapsed = () => Math.round(performance.now() - start);

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
      windowsHide: true,
    });

    const stdoutChunks: Buffer[] = [];
    let stderr = '';
    let timedOut = false;
    let exited = false;
    let settled = false;
    let graceTimer: NodeJS.Timeout | undefined;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      fn();
    };

    const settleTimeout = () => {
      settle(() => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        const durationMs = elapsed();
        reject(
          new AgentExecutionError(
            `CLI subprocess timed out after ${options.timeoutMs}ms (killed after ${durationMs}ms)`,
            'timeout',
            durationMs,
          ),
        );
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(child);
      if (exited) {
        settleTimeout();
        return;
      }
      graceTimer = setTimeout(settleTimeout, KILL_GRACE_MS);
    }, options.timeoutMs);

    child.on('spawn', () => {
      try { options.onSpawn?.(child.pid ?? 0, command); } catch { /* callback error isolation */ }
    });

    child.stdout?.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });
    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString('utf-8');
      if (stderr.length < STDERR_CAPTURE_CHARS) stderr += chunk;
      try { options.onStderr?.(chunk); } catch { /* callback error isolation */ }
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      settle(() => {
        if (err.code === 'ENOENT') {
          reject(new AgentExecutionError(`CLI command not found: ${command}`, 'not-found', 0));
          return;
        }
        reject(new AgentExecutionError(`CLI subprocess failed: ${err.message}`, 'failed', elapsed()));
      });
    });

    child.on('exit', () => {
      exited = true;
      if (timedOut) settleTimeout();
    });

    child.on('close', (code: number | null) => {
      if (timedOut) {
        settleTimeout();
        return;
      }
      settle(() => {
        resolve({
          // Buffer decoding substitutes U+FFFD for invalid UTF-8 sequences
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr,
          exitCode: code,
          durationMs: elapsed(),
        });
      });
    });
  });
}

/** SIGKILL the child's process group, or the child alone when there is none. */
export function killProcessTree(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, 'SIGKILL');
    }
  } catch {
    // Group already gone
    child.kill('SIGKILL');
  }
}

export function buildFilteredEnv(
  extraKeys: readonly string[] = [],
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of [...BASE_ENV_ALLOWLIST, ...extraKeys]) {
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
