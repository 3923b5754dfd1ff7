import { EventEmitter } from 'eventemitter3';
import { join, resolve } from 'path';
import type { HopperConfig, Logger, TaskResult, TaskStatus } from './types.js';
import { createDefaultLogger } from './logger.js';
import { resolveConcurrency, validateConfig } from './config.js';
import { WorkspaceDiscovery } from './workspace/discovery.js';
import type { WorkspaceGraph } from './workspace/graph.js';
import { selectWorkspaces } from './workspace/filter.js';
import { PipelineLoader } from './pipeline/loader.js';
import type { PipelineConfig } from './pipeline/schema.js';
import { TaskGraphResolver } from './graph/resolver.js';
import type { TaskGraph } from './graph/task-graph.js';
import { FileHasher } from './hashing/file-hasher.js';
import { computeGlobalHash, hashEnv } from './hashing/fingerprint.js';
import type { CacheBackend } from './cache/types.js';
import { InMemoryCacheBackend } from './cache/memory-backend.js';
import { LocalCacheBackend } from './cache/local-backend.js';
import { OutputCache } from './cache/output-cache.js';
import { CommandRunner, type TaskRunner } from './exec/command-runner.js';
import { TaskScheduler, type SchedulerEvents } from './scheduler/scheduler.js';
import { TaskWorker } from './scheduler/task-worker.js';

export interface PlanOptions {
  /** Workspace filters, see selectWorkspaces */
  filter?: string[];
}

export interface RunOptions extends PlanOptions {
  signal?: AbortSignal;
}

export interface TaskPlan {
  graph: TaskGraph;
  workspaces: WorkspaceGraph;
  pipeline: PipelineConfig;
  /** Workspaces selected by the filters */
  selected: string[];
}

export interface DryRunTask {
  taskId: string;
  task: string;
  package: string;
  hash: string;
  command: string | null;
  outputs: string[];
  /** Relative to the repository root */
  directory: string;
  dependencies: string[];
  dependents: string[];
  cache: boolean;
}

export interface DryRunReport {
  packages: string[];
  tasks: DryRunTask[];
}

export type StatusCounts = Record<Exclude<TaskStatus, 'pending' | 'running'>, number>;

export interface RunSummary {
  success: boolean;
  cancelled: boolean;
  results: TaskResult[];
  counts: StatusCounts;
  total: number;
  duration: number;
  peakConcurrency: number;
}

/**
 * Hopper - Main entry point: discover, plan and run tasks
 *
 * @example
 * ```typescript
 * const hopper = new Hopper({ rootDir: '/repo', concurrency: 4 });
 *
 * hopper.on('task:finish', (result) => console.log(result.taskId, result.status));
 *
 * const summary = await hopper.run(['build', 'test'], { filter: ['web...'] });
 * if (!summary.success) process.exitCode = 1;
 * ```
 */
export class Hopper extends EventEmitter<SchedulerEvents> {
  private config: HopperConfig;
  private rootDir: string;
  private logger: Logger;
  private concurrency: number;
  private env: Record<string, string | undefined>;
  private runner: TaskRunner;
  private cache: OutputCache;
  private initPromise?: Promise<void>;

  constructor(config: HopperConfig) {
    super();
    validateConfig(config);

    this.config = config;
    this.rootDir = resolve(config.rootDir);
    this.logger = config.logger || createDefaultLogger(config.logLevel || 'info');
    this.concurrency = resolveConcurrency(config.concurrency);
    this.env = config.env ?? { ...process.env };
    this.runner =
      config.runner ??
      new CommandRunner({ killPolicy: config.killPolicy, gracePeriodMs: config.gracePeriodMs });
    this.cache = new OutputCache(this.createBackend(), {
      read: config.cache?.read,
      write: config.cache?.write,
      logger: this.logger,
    });

    this.logger.debug('Hopper initialized', {
      rootDir: this.rootDir,
      concurrency: this.concurrency,
      cache: this.cache.backendName,
    });
  }

  private createBackend(): CacheBackend {
    const cache = this.config.cache ?? { type: 'local' };

    switch (cache.type) {
      case 'memory':
        return new InMemoryCacheBackend();
      case 'custom':
        if (!cache.backend) {
          throw new Error('Custom cache type requires backend');
        }
        return cache.backend;
      case 'local':
        return new LocalCacheBackend(
          cache.dir ? resolve(this.rootDir, cache.dir) : join(this.rootDir, '.hopper', 'cache'),
          this.logger
        );
    }
  }

  /**
   * Initialize the cache backend once per instance
   */
  private ensureInitialized(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.cache.initialize();
    }
    return this.initPromise;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getCache(): OutputCache {
    return this.cache;
  }

  /**
   * Discover the workspaces of the repository
   */
  async discover(): Promise<WorkspaceGraph> {
    return new WorkspaceDiscovery(this.logger).discover(this.rootDir);
  }

  /**
   * Build the task graph for the requested tasks
   *
   * @throws DiscoveryError, PipelineConfigError, FilterError, ResolveError, CycleError
   */
  async plan(tasks: string[], options: PlanOptions = {}): Promise<TaskPlan> {
    const workspaces = await this.discover();
    const pipeline = await new PipelineLoader(this.logger).load(this.rootDir);
    const selected = selectWorkspaces(workspaces, options.filter);
    const graph = new TaskGraphResolver(this.logger).resolve({
      tasks,
      workspaces,
      pipeline,
      selected,
    });

    this.logger.info(`Planned ${graph.size} tasks across ${selected.length} workspaces`, { tasks });

    return { graph, workspaces, pipeline, selected };
  }

  /**
   * Describe what a run would do, including every fingerprint, without
   * running anything
   */
  async dryRun(tasks: string[], options: PlanOptions = {}): Promise<DryRunReport> {
    const plan = await this.plan(tasks, options);
    const worker = await this.createWorker(plan);
    const { graph, workspaces } = plan;

    const report: DryRunTask[] = [];
    for (const id of graph.topologicalOrder()) {
      const node = graph.get(id);
      if (!node) continue;
      report.push({
        taskId: node.id,
        task: node.task,
        package: node.workspace,
        hash: await worker.fingerprint(node),
        command: node.command ?? null,
        outputs: node.definition.outputs,
        directory: workspaces.get(node.workspace)?.path ?? '',
        dependencies: graph.dependenciesOf(node.id),
        dependents: graph.dependentsOf(node.id),
        cache: node.definition.cache,
      });
    }

    return { packages: plan.selected, tasks: report };
  }

  /**
   * Run the requested tasks
   *
   * Planning errors reject before any task starts; task failures are
   * reported in the summary.
   */
  async run(tasks: string[], options: RunOptions = {}): Promise<RunSummary> {
    const started = Date.now();
    const plan = await this.plan(tasks, options);
    await this.ensureInitialized();
    const worker = await this.createWorker(plan);

    const scheduler = new TaskScheduler({ concurrency: this.concurrency, logger: this.logger });
    scheduler.on('task:start', (node) => this.emit('task:start', node));
    scheduler.on('task:finish', (result) => this.emit('task:finish', result));
    scheduler.on('task:skip', (result) => this.emit('task:skip', result));
    scheduler.on('run:cancel', () => this.emit('run:cancel'));

    const outcome = await scheduler.run(
      plan.graph,
      (node, signal) => worker.execute(node, signal),
      { signal: options.signal }
    );

    const counts: StatusCounts = {
      succeeded: 0,
      cached: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
    };
    for (const result of outcome.results) {
      if (result.status !== 'pending' && result.status !== 'running') {
        counts[result.status]++;
      }
    }

    const summary: RunSummary = {
      success: counts.failed === 0 && counts.skipped === 0 && counts.cancelled === 0,
      cancelled: outcome.cancelled,
      results: outcome.results,
      counts,
      total: outcome.results.length,
      duration: Date.now() - started,
      peakConcurrency: outcome.peakConcurrency,
    };

    this.logger.info('Run finished', {
      success: summary.success,
      ...counts,
      duration: summary.duration,
    });

    return summary;
  }

  /**
   * Release the cache backend
   */
  async close(): Promise<void> {
    await this.cache.close();
  }

  private async createWorker(plan: TaskPlan): Promise<TaskWorker> {
    const hasher = new FileHasher(this.rootDir, this.logger);
    const globalFiles = await hasher.hashGlobalDependencies(plan.pipeline.globalDependencies);
    const globalHash = computeGlobalHash(globalFiles, hashEnv(plan.pipeline.globalEnv, this.env));

    return new TaskWorker({
      rootDir: this.rootDir,
      graph: plan.graph,
      workspaces: plan.workspaces,
      hasher,
      cache: this.cache,
      runner: this.runner,
      globalHash,
      env: this.env,
      logger: this.logger,
      output: this.config.output,
    });
  }
}
