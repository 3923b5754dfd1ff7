import { EventEmitter } from 'eventemitter3';
import type { Logger, TaskId, TaskNode, TaskResult, TaskStatus } from '../types.js';
import { CycleError, insertSorted, type TaskGraph } from '../graph/task-graph.js';

/**
 * Scheduler events
 */
export interface SchedulerEvents {
  'task:start': (node: TaskNode) => void;
  'task:finish': (result: TaskResult) => void;
  'task:skip': (result: TaskResult) => void;
  'run:cancel': () => void;
}

export interface SchedulerConfig {
  /** Maximum tasks running at once (default 1) */
  concurrency?: number;
  logger?: Logger;
}

/**
 * Executes one task instance; receives the run's cancellation signal
 */
export type TaskWorkerFn = (node: TaskNode, signal: AbortSignal) => Promise<TaskResult>;

export interface ScheduleOptions {
  signal?: AbortSignal;
}

export interface ScheduleResult {
  /** Final result per task instance, in (workspace, task) order */
  results: TaskResult[];
  /** Instances in the order they were started */
  startOrder: TaskId[];
  peakConcurrency: number;
  cancelled: boolean;
}

const COMPLETED: ReadonlySet<TaskStatus> = new Set(['succeeded', 'cached']);

/**
 * TaskScheduler - Bounded worker pool over a task graph
 *
 * - An instance starts once every predecessor succeeded or was cached
 * - Ready instances start in (workspace, task) order
 * - A failure skips every transitive dependent; other branches continue
 * - Cancellation stops new starts, marks pending instances cancelled and
 *   forwards the abort to running workers
 *
 * @example
 * ```typescript
 * const scheduler = new TaskScheduler({ concurrency: 4 });
 * scheduler.on('task:finish', (result) => console.log(result.taskId, result.status));
 * const { results } = await scheduler.run(graph, (node, signal) => worker.execute(node, signal));
 * ```
 */
export class TaskScheduler extends EventEmitter<SchedulerEvents> {
  private concurrency: number;
  private logger?: Logger;

  constructor(config: SchedulerConfig = {}) {
    super();
    const concurrency = config.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.logger = config.logger;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  /**
   * @throws CycleError if the graph is not a DAG
   */
  run(graph: TaskGraph, worker: TaskWorkerFn, options: ScheduleOptions = {}): Promise<ScheduleResult> {
    const cycle = graph.findCycle();
    if (cycle) {
      return Promise.reject(new CycleError(cycle));
    }

    const nodes = graph.nodes();
    const remaining = new Map<TaskId, number>();
    const status = new Map<TaskId, TaskStatus>();
    const results = new Map<TaskId, TaskResult>();
    const startOrder: TaskId[] = [];
    const ready: TaskNode[] = [];

    for (const node of nodes) {
      const count = graph.dependenciesOf(node.id).length;
      remaining.set(node.id, count);
      status.set(node.id, 'pending');
      if (count === 0) ready.push(node);
    }

    const controller = new AbortController();
    let running = 0;
    let peakConcurrency = 0;
    let cancelled = false;
    let settled = false;

    this.logger?.debug('Scheduling task graph', { size: nodes.length, concurrency: this.concurrency });

    return new Promise<ScheduleResult>((resolve, reject) => {
      const finishIfDone = () => {
        if (settled || running > 0 || (ready.length > 0 && !cancelled)) return;
        settled = true;
        options.signal?.removeEventListener('abort', onAbort);

        for (const node of nodes) {
          if (status.get(node.id) === 'pending') {
            status.set(node.id, 'cancelled');
            results.set(node.id, { taskId: node.id, status: 'cancelled', duration: 0 });
          }
        }

        resolve({
          results: nodes.flatMap((node) => {
            const result = results.get(node.id);
            return result ? [result] : [];
          }),
          startOrder,
          peakConcurrency,
          cancelled,
        });
      };

      const fail = (error: unknown) => {
        if (settled) return;
        settled = true;
        controller.abort();
        reject(error);
      };

      const skipDependents = (node: TaskNode, result: TaskResult) => {
        const terminal: TaskStatus = result.status === 'cancelled' ? 'cancelled' : 'skipped';
        for (const id of graph.transitiveDependents(node.id)) {
          if (status.get(id) !== 'pending') continue;
          const skipped: TaskResult = { taskId: id, status: terminal, duration: 0, skippedBecause: node.id };
          status.set(id, terminal);
          results.set(id, skipped);
          this.emit('task:skip', skipped);
        }
      };

      const complete = (node: TaskNode, result: TaskResult) => {
        running--;
        status.set(node.id, result.status);
        results.set(node.id, result);
        this.emit('task:finish', result);

        if (COMPLETED.has(result.status)) {
          for (const id of graph.dependentsOf(node.id)) {
            const left = (remaining.get(id) ?? 0) - 1;
            remaining.set(id, left);
            const dependent = graph.get(id);
            if (left === 0 && dependent && status.get(id) === 'pending') {
              insertSorted(ready, dependent);
            }
          }
        } else {
          skipDependents(node, result);
        }
      };

      const start = (node: TaskNode) => {
        running++;
        peakConcurrency = Math.max(peakConcurrency, running);
        status.set(node.id, 'running');
        startOrder.push(node.id);
        this.emit('task:start', node);

        const started = Date.now();
        worker(node, controller.signal)
          .catch(
            (error: unknown): TaskResult => ({
              taskId: node.id,
              status: 'failed',
              duration: Date.now() - started,
              error: error instanceof Error ? error : new Error(String(error)),
            })
          )
          .then((result) => {
            complete(node, result);
            pump();
          })
          .catch(fail);
      };

      const pump = () => {
        while (!cancelled && running < this.concurrency && ready.length > 0) {
          const node = ready.shift();
          if (node) start(node);
        }
        finishIfDone();
      };

      const onAbort = () => {
        if (cancelled) return;
        cancelled = true;
        this.logger?.info('Run cancelled, no new tasks will start');
        this.emit('run:cancel');
        controller.abort();
        finishIfDone();
      };

      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      try {
        pump();
      } catch (error) {
        fail(error);
      }
    });
  }
}
