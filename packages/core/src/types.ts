/**
 * Core types for Hopper
 */

import type { CacheBackend } from './cache/types.js';
import type { TaskRunner } from './exec/command-runner.js';

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

/**
 * Receives task output lines (live or replayed from cache)
 */
export interface OutputSink {
  write(taskId: string, text: string): void;
}

// ============================================================================
// Workspace Types
// ============================================================================

export interface Workspace {
  name: string;
  /** POSIX path relative to the repository root, '' for the root workspace */
  path: string;
  absolutePath: string;
  scripts: Readonly<Record<string, string>>;
  /** Names of other workspaces this one depends on, sorted */
  dependencies: readonly string[];
}

// ============================================================================
// Task Types
// ============================================================================

export type OutputLogsMode = 'full' | 'hash-only' | 'new-only' | 'errors-only' | 'none';

export interface TaskDefinition {
  dependsOn: string[];
  outputs: string[];
  inputs: string[];
  env: string[];
  cache: boolean;
  outputLogs: OutputLogsMode;
}

/**
 * `workspace#task`, or `//#task` for root-scoped tasks
 */
export type TaskId = string;

export interface TaskNode {
  id: TaskId;
  workspace: string;
  task: string;
  definition: TaskDefinition;
  /** Script text, undefined when the workspace has no such script */
  command?: string;
  directory: string;
}

export type TaskStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'cached'
  | 'failed'
  | 'skipped'
  | 'cancelled';

export interface TaskResult {
  taskId: TaskId;
  status: TaskStatus;
  fingerprint?: string;
  duration: number;
  logs?: string;
  exitCode?: number | null;
  error?: Error;
  /** Set on skipped tasks: the failed upstream instance */
  skippedBecause?: TaskId;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type KillPolicy = 'graceful' | 'immediate' | 'wait';

export interface CacheConfig {
  type: 'local' | 'memory' | 'custom';
  /** Local cache directory, default `<rootDir>/.hopper/cache` */
  dir?: string;
  /** Custom backend */
  backend?: CacheBackend;
  /** Read existing entries (disabled by --force) */
  read?: boolean;
  /** Write new entries (disabled by --no-cache) */
  write?: boolean;
}

export interface HopperConfig {
  rootDir: string;
  /** Max tasks in flight: a count or a percentage of CPUs such as '50%' */
  concurrency?: number | string;
  cache?: CacheConfig;
  killPolicy?: KillPolicy;
  gracePeriodMs?: number;
  /** Environment seen by fingerprints and tasks, default process.env */
  env?: Record<string, string | undefined>;
  logLevel?: LogLevel;
  logger?: Logger;
  output?: OutputSink;
  runner?: TaskRunner;
}
