import { delimiter, join } from 'path';
import type { Logger, OutputSink, TaskId, TaskNode, TaskResult, Workspace } from '../types.js';
import type { TaskGraph } from '../graph/task-graph.js';
import type { WorkspaceGraph } from '../workspace/graph.js';
import { ROOT_WORKSPACE } from '../workspace/schema.js';
import type { FileHasher } from '../hashing/file-hasher.js';
import { computeFingerprint, hashEnv } from '../hashing/fingerprint.js';
import type { OutputCache } from '../cache/output-cache.js';
import { collectOutputs, restoreOutputs } from '../cache/artifact.js';
import type { CacheArtifact, CachedFile } from '../cache/types.js';
import type { CommandResult, TaskRunner } from '../exec/command-runner.js';

/**
 * Task execution error - the underlying command did not succeed
 */
export class TaskExecutionError extends Error {
  constructor(
    message: string,
    public taskId: TaskId,
    public exitCode?: number | null
  ) {
    super(message);
    this.name = 'TaskExecutionError';
  }
}

export interface TaskWorkerConfig {
  rootDir: string;
  graph: TaskGraph;
  workspaces: WorkspaceGraph;
  hasher: FileHasher;
  cache: OutputCache;
  runner: TaskRunner;
  /** Hash of global dependencies and global env */
  globalHash: string;
  env: Record<string, string | undefined>;
  logger?: Logger;
  output?: OutputSink;
}

/**
 * TaskWorker - Runs one task instance through the output cache
 *
 * Fingerprints are memoized per instance; an instance's fingerprint folds
 * in the fingerprints of all its upstream instances.
 */
export class TaskWorker {
  private config: TaskWorkerConfig;
  private logger?: Logger;
  private fingerprints: Map<TaskId, Promise<string>> = new Map();

  constructor(config: TaskWorkerConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Fingerprint of a task instance (computes upstream ones as needed)
   */
  fingerprint(node: TaskNode): Promise<string> {
    let pending = this.fingerprints.get(node.id);
    if (!pending) {
      pending = this.computeFingerprint(node);
      this.fingerprints.set(node.id, pending);
    }
    return pending;
  }

  private async computeFingerprint(node: TaskNode): Promise<string> {
    const { graph, hasher, env, globalHash } = this.config;
    const workspace = this.workspace(node);

    const dependencies: Record<TaskId, string> = {};
    for (const id of graph.dependenciesOf(node.id)) {
      const upstream = graph.get(id);
      if (upstream) dependencies[id] = await this.fingerprint(upstream);
    }

    const files = await hasher.hashWorkspace(workspace, {
      inputs: node.definition.inputs,
      excludes: node.definition.outputs,
      skipDirs: workspace.name === ROOT_WORKSPACE ? this.workspacePaths() : [],
    });

    return computeFingerprint({
      taskId: node.id,
      command: node.command,
      global: globalHash,
      files,
      env: hashEnv(node.definition.env, env),
      outputs: node.definition.outputs,
      dependencies,
    });
  }

  async execute(node: TaskNode, signal: AbortSignal): Promise<TaskResult> {
    const started = Date.now();
    const fingerprint = await this.fingerprint(node);

    if (node.command === undefined) {
      this.logger?.debug(`${node.id} has no script, nothing to run`);
      return { taskId: node.id, status: 'succeeded', fingerprint, duration: Date.now() - started };
    }

    if (!node.definition.cache) {
      return this.runCommand(node, fingerprint, signal, started);
    }

    const { cache } = this.config;
    return cache.withLock(fingerprint, async () => {
      const hit = await cache.fetch(fingerprint);
      if (hit) {
        const restored = await this.restore(node, hit);
        if (restored) {
          this.replay(node, hit);
          return {
            taskId: node.id,
            status: 'cached',
            fingerprint,
            duration: Date.now() - started,
            logs: hit.logs,
          };
        }
      }

      const result = await this.runCommand(node, fingerprint, signal, started);
      if (result.status === 'succeeded') {
        await this.save(node, fingerprint, result);
      }
      return result;
    });
  }

  private async runCommand(
    node: TaskNode,
    fingerprint: string,
    signal: AbortSignal,
    started: number
  ): Promise<TaskResult> {
    const mode = node.definition.outputLogs;
    const sink = this.config.output;
    const live = mode === 'full' || mode === 'new-only';

    if (mode === 'hash-only' || live) {
      sink?.write(node.id, `cache miss, executing ${fingerprint}\n`);
    }

    this.logger?.debug(`Running ${node.id}`, { command: node.command, fingerprint });

    const result: CommandResult = await this.config.runner.run({
      taskId: node.id,
      command: node.command ?? '',
      cwd: node.directory,
      env: this.taskEnv(node, fingerprint),
      signal,
      onOutput: live && sink ? (chunk) => sink.write(node.id, chunk) : undefined,
    });

    const duration = Date.now() - started;

    if (result.cancelled) {
      return { taskId: node.id, status: 'cancelled', fingerprint, duration, logs: result.output };
    }

    if (!result.success) {
      if (mode === 'errors-only' && sink) {
        sink.write(node.id, result.output);
      }
      const error = new TaskExecutionError(
        `${node.id}: ${result.error ?? 'command failed'}`,
        node.id,
        result.exitCode
      );
      this.logger?.error(error.message);
      return {
        taskId: node.id,
        status: 'failed',
        fingerprint,
        duration,
        logs: result.output,
        exitCode: result.exitCode,
        error,
      };
    }

    return {
      taskId: node.id,
      status: 'succeeded',
      fingerprint,
      duration,
      logs: result.output,
      exitCode: result.exitCode,
    };
  }

  private async restore(node: TaskNode, artifact: CacheArtifact): Promise<boolean> {
    try {
      await restoreOutputs(node.directory, artifact.files);
      return true;
    } catch (error) {
      this.logger?.warn(`Could not restore cached outputs of ${node.id}, running instead`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      return false;
    }
  }

  private async save(node: TaskNode, fingerprint: string, result: TaskResult): Promise<void> {
    let files: CachedFile[];
    try {
      files = await collectOutputs(node.directory, node.definition.outputs);
    } catch (error) {
      this.logger?.warn(`Could not collect outputs of ${node.id}, not caching`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      return;
    }

    await this.config.cache.store(fingerprint, {
      fingerprint,
      taskId: node.id,
      files,
      logs: result.logs ?? '',
      duration: result.duration,
      createdAt: Date.now(),
    });
  }

  private replay(node: TaskNode, artifact: CacheArtifact): void {
    const sink = this.config.output;
    if (!sink) return;

    const mode = node.definition.outputLogs;
    if (mode === 'full' || mode === 'hash-only') {
      sink.write(node.id, `cache hit, replaying logs ${artifact.fingerprint}\n`);
    }
    if (mode === 'full' && artifact.logs) {
      sink.write(node.id, artifact.logs);
    }
  }

  private taskEnv(node: TaskNode, fingerprint: string): Record<string, string | undefined> {
    const { env, rootDir } = this.config;
    const bins = [join(node.directory, 'node_modules', '.bin'), join(rootDir, 'node_modules', '.bin')];
    return {
      ...env,
      PATH: [...bins, env.PATH ?? ''].filter(Boolean).join(delimiter),
      HOPPER_HASH: fingerprint,
    };
  }

  private workspace(node: TaskNode): Workspace {
    const workspace = this.config.workspaces.get(node.workspace);
    if (!workspace) {
      throw new Error(`Unknown workspace '${node.workspace}' for ${node.id}`);
    }
    return workspace;
  }

  private workspacePaths(): string[] {
    return this.config.workspaces.list().map((ws) => ws.path);
  }
}
