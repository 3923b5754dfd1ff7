/**
 * Hopper
 *
 * Task runner for JavaScript monorepos: workspace discovery, task graphs,
 * parallel execution and a content-addressed output cache
 */

export {
  Hopper,
  type PlanOptions,
  type RunOptions,
  type TaskPlan,
  type DryRunTask,
  type DryRunReport,
  type RunSummary,
  type StatusCounts,
} from './hopper.js';

export {
  HopperConfigSchema,
  ConfigError,
  validateConfig,
  resolveConcurrency,
  loadConfigFromEnv,
  DEFAULT_CONCURRENCY,
} from './config.js';

export {
  createDefaultLogger,
  createPrefixedSink,
  silentLogger,
  isLogLevel,
  type TextStream,
} from './logger.js';

export type {
  HopperConfig,
  CacheConfig,
  KillPolicy,
  LogLevel,
  Logger,
  OutputSink,
  OutputLogsMode,
  Workspace,
  TaskDefinition,
  TaskId,
  TaskNode,
  TaskStatus,
  TaskResult,
} from './types.js';

// Export workspace system
export * from './workspace/index.js';

// Export pipeline system
export * from './pipeline/index.js';

// Export task graph system
export * from './graph/index.js';

// Export hashing system
export * from './hashing/index.js';

// Export cache system
export * from './cache/index.js';

// Export execution system
export * from './exec/index.js';

// Export scheduler system
export * from './scheduler/index.js';

// Export command line
export * from './cli/index.js';
