import type { Logger, TaskDefinition, TaskId, TaskNode } from '../types.js';
import type { PipelineConfig } from '../pipeline/schema.js';
import { findTaskDefinition } from '../pipeline/loader.js';
import type { WorkspaceGraph } from '../workspace/graph.js';
import { ROOT_WORKSPACE } from '../workspace/schema.js';
import { CycleError, TaskGraph } from './task-graph.js';
import { formatTaskId, parseDependencyRef, parseTaskId } from './task-id.js';

/**
 * Raised when a requested task or a dependency reference cannot be
 * mapped onto the workspace graph
 */
export class ResolveError extends Error {
  constructor(
    message: string,
    public taskId?: TaskId
  ) {
    super(message);
    this.name = 'ResolveError';
  }
}

export interface ResolveOptions {
  /** Requested tasks: `build`, or a single instance such as `web#build` */
  tasks: string[];
  workspaces: WorkspaceGraph;
  pipeline: PipelineConfig;
  /** Workspaces receiving bare task names; defaults to every workspace */
  selected?: string[];
}

/**
 * TaskGraphResolver - Expands pipeline definitions into a task graph
 *
 * @example
 * ```typescript
 * const graph = new TaskGraphResolver(logger).resolve({
 *   tasks: ['build'],
 *   workspaces,
 *   pipeline,
 * });
 * graph.topologicalOrder(); // ['ui#build', 'web#build']
 * ```
 */
export class TaskGraphResolver {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * @throws ResolveError for unknown tasks or workspaces
   * @throws CycleError if the expanded graph has a cycle
   */
  resolve(options: ResolveOptions): TaskGraph {
    const { workspaces, pipeline } = options;
    const selected = options.selected ?? workspaces.list().map((ws) => ws.name);
    const graph = new TaskGraph();
    const queue: TaskId[] = [];

    const lookup = (workspace: string, task: string): TaskDefinition | undefined =>
      findTaskDefinition(pipeline, workspace, task, workspace === ROOT_WORKSPACE);

    const ensureNode = (workspace: string, task: string, definition: TaskDefinition): TaskId => {
      const id = formatTaskId(workspace, task);
      if (!graph.has(id)) {
        graph.addNode(this.createNode(options.workspaces, workspace, task, definition));
        queue.push(id);
      }
      return id;
    };

    // Entry points
    for (const requested of options.tasks) {
      const explicit = parseTaskId(requested);
      let entries = 0;

      if (explicit) {
        if (!workspaces.has(explicit.workspace)) {
          throw new ResolveError(`Unknown workspace '${explicit.workspace}' in '${requested}'`, requested);
        }
        const definition = lookup(explicit.workspace, explicit.task);
        if (definition) {
          ensureNode(explicit.workspace, explicit.task, definition);
          entries++;
        }
      } else {
        for (const name of selected) {
          const definition = lookup(name, requested);
          if (definition) {
            ensureNode(name, requested, definition);
            entries++;
          }
        }

        const root = workspaces.root;
        const rootDefinition = lookup(ROOT_WORKSPACE, requested);
        if (root && rootDefinition) {
          ensureNode(ROOT_WORKSPACE, requested, rootDefinition);
          entries++;
        }
      }

      if (entries === 0) {
        throw new ResolveError(`Could not find task '${requested}' in the pipeline`, requested);
      }
    }

    // Expand dependsOn
    while (queue.length > 0) {
      const id = queue.shift();
      const node = id === undefined ? undefined : graph.get(id);
      if (!node) continue;

      for (const raw of node.definition.dependsOn) {
        const ref = parseDependencyRef(raw);

        if (ref.kind === 'upstream') {
          for (const dep of workspaces.dependencies(node.workspace)) {
            const definition = lookup(dep, ref.task);
            if (definition) {
              graph.addEdge(ensureNode(dep, ref.task, definition), node.id);
            }
          }
          continue;
        }

        const target =
          ref.kind === 'same'
            ? node.workspace
            : ref.kind === 'root'
              ? ROOT_WORKSPACE
              : ref.workspace;

        if (!workspaces.has(target)) {
          throw new ResolveError(`${node.id} depends on '${raw}': unknown workspace '${target}'`, node.id);
        }

        const definition = lookup(target, ref.task);
        if (!definition) {
          throw new ResolveError(
            `${node.id} depends on '${raw}' but no definition applies to ${formatTaskId(target, ref.task)}`,
            node.id
          );
        }
        graph.addEdge(ensureNode(target, ref.task, definition), node.id);
      }
    }

    const cycle = graph.findCycle();
    if (cycle) {
      throw new CycleError(cycle);
    }

    this.logger?.debug('Resolved task graph', { tasks: options.tasks, size: graph.size });

    return graph;
  }

  private createNode(
    workspaces: WorkspaceGraph,
    workspace: string,
    task: string,
    definition: TaskDefinition
  ): TaskNode {
    const ws = workspaces.get(workspace);
    if (!ws) {
      throw new ResolveError(`Unknown workspace '${workspace}'`);
    }

    return {
      id: formatTaskId(workspace, task),
      workspace,
      task,
      definition,
      command: Object.hasOwn(ws.scripts, task) ? ws.scripts[task] : undefined,
      directory: ws.absolutePath,
    };
  }
}
