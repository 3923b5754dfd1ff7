/**
 * CommandRunner - Runs task scripts through the shell
 *
 * Features:
 * - Combined, ordered log capture alongside separate stdout/stderr
 * - Optional timeout
 * - Cancellation through AbortSignal with a kill policy
 * - Whole process group termination on POSIX
 */

import { spawn, type ChildProcess } from 'child_process';
import type { KillPolicy, TaskId } from '../types.js';

/**
 * Runner configuration
 */
export interface CommandRunnerConfig {
  /**
   * Maximum execution time in milliseconds, 0 disables
   * Default: 0
   */
  timeout?: number;

  /**
   * What to do with a running command when the run is cancelled
   * Default: 'graceful'
   */
  killPolicy?: KillPolicy;

  /**
   * Delay between SIGTERM and SIGKILL under the graceful policy
   * Default: 5000
   */
  gracePeriodMs?: number;

  /**
   * Maximum captured output size in characters
   * Default: 10MB
   */
  maxBuffer?: number;
}

export interface RunRequest {
  taskId: TaskId;
  command: string;
  cwd: string;
  env: Record<string, string | undefined>;
  signal?: AbortSignal;
  /** Live output, in arrival order */
  onOutput?: (chunk: string) => void;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  exitCode: number | null;
  signal: string | null;
  duration: number;
  timedOut: boolean;
  cancelled: boolean;
  error?: string;
}

/**
 * Anything able to execute a task's command; swapped out in tests
 */
export interface TaskRunner {
  run(request: RunRequest): Promise<CommandResult>;
}

export class CommandRunner implements TaskRunner {
  private config: Required<CommandRunnerConfig>;

  constructor(config?: CommandRunnerConfig) {
    this.config = {
      timeout: config?.timeout ?? 0,
      killPolicy: config?.killPolicy ?? 'graceful',
      gracePeriodMs: config?.gracePeriodMs ?? 5000,
      maxBuffer: config?.maxBuffer ?? 10 * 1024 * 1024,
    };
  }

  async run(request: RunRequest): Promise<CommandResult> {
    const startTime = Date.now();

    if (request.signal?.aborted) {
      return {
        success: false,
        stdout: '',
        stderr: '',
        output: '',
        exitCode: null,
        signal: null,
        duration: 0,
        timedOut: false,
        cancelled: true,
        error: 'Cancelled before start',
      };
    }

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let output = '';
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;
      let timeoutId: NodeJS.Timeout | undefined;

      const child = spawn(request.command, {
        cwd: request.cwd,
        env: request.env,
        shell: true,
        detached: process.platform !== 'win32',
      });

      const capture = (current: string, chunk: string) =>
        current.length + chunk.length <= this.config.maxBuffer ? current + chunk : current;

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      child.stdout?.on('data', (chunk: string) => {
        stdout = capture(stdout, chunk);
        output = capture(output, chunk);
        request.onOutput?.(chunk);
      });

      child.stderr?.on('data', (chunk: string) => {
        stderr = capture(stderr, chunk);
        output = capture(output, chunk);
        request.onOutput?.(chunk);
      });

      const terminate = (immediate: boolean) => {
        if (immediate) {
          killTree(child, 'SIGKILL');
          return;
        }
        killTree(child, 'SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            killTree(child, 'SIGKILL');
          }
        }, this.config.gracePeriodMs);
      };

      const onAbort = () => {
        if (this.config.killPolicy === 'wait') return;
        cancelled = true;
        terminate(this.config.killPolicy === 'immediate');
      };
      request.signal?.addEventListener('abort', onAbort, { once: true });

      if (this.config.timeout > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          terminate(false);
        }, this.config.timeout);
      }

      const cleanup = () => {
        if (timeoutId) clearTimeout(timeoutId);
        if (killTimer) clearTimeout(killTimer);
        request.signal?.removeEventListener('abort', onAbort);
      };

      child.on('close', (exitCode, signal) => {
        cleanup();
        resolve({
          success: exitCode === 0 && !timedOut && !cancelled,
          stdout,
          stderr,
          output,
          exitCode,
          signal,
          duration: Date.now() - startTime,
          timedOut,
          cancelled,
          error: timedOut
            ? `Command timed out after ${this.config.timeout}ms`
            : cancelled
              ? 'Command cancelled'
              : exitCode !== 0
                ? `Command exited with code ${exitCode}`
                : undefined,
        });
      });

      child.on('error', (error) => {
        cleanup();
        resolve({
          success: false,
          stdout,
          stderr,
          output,
          exitCode: null,
          signal: null,
          duration: Date.now() - startTime,
          timedOut: false,
          cancelled,
          error: error.message,
        });
      });
    });
  }

  getConfig(): Required<CommandRunnerConfig> {
    return { ...this.config };
  }
}

/**
 * Signal the child's process group so shell grandchildren die too
 */
function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ESRCH') throw error;
    }
  }
  child.kill(signal);
}
