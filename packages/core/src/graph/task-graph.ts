import type { TaskId, TaskNode } from '../types.js';

/**
 * Raised when task dependencies form a cycle
 */
export class CycleError extends Error {
  /** Task ids along the cycle; the first id is repeated at the end */
  public readonly cycle: TaskId[];

  constructor(cycle: TaskId[]) {
    super(`Invalid task dependency graph: cyclic dependency detected: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

/**
 * (workspace, task) ordering used wherever the graph is enumerated
 */
export function compareNodes(a: TaskNode, b: TaskNode): number {
  if (a.workspace !== b.workspace) return a.workspace < b.workspace ? -1 : 1;
  if (a.task !== b.task) return a.task < b.task ? -1 : 1;
  return 0;
}

/**
 * TaskGraph - Directed graph over task instances
 *
 * An edge `from -> to` means `from` must complete before `to` starts.
 */
export class TaskGraph {
  private nodeMap: Map<TaskId, TaskNode> = new Map();
  private dependencyMap: Map<TaskId, Set<TaskId>> = new Map();
  private dependentMap: Map<TaskId, Set<TaskId>> = new Map();

  get size(): number {
    return this.nodeMap.size;
  }

  addNode(node: TaskNode): void {
    if (this.nodeMap.has(node.id)) return;
    this.nodeMap.set(node.id, node);
    this.dependencyMap.set(node.id, new Set());
    this.dependentMap.set(node.id, new Set());
  }

  /**
   * Record that `from` must complete before `to`
   */
  addEdge(from: TaskId, to: TaskId): void {
    const dependencies = this.dependencyMap.get(to);
    const dependents = this.dependentMap.get(from);
    if (!dependencies || !dependents) {
      throw new Error(`Cannot add edge ${from} -> ${to}: unknown task`);
    }
    dependencies.add(from);
    dependents.add(to);
  }

  has(id: TaskId): boolean {
    return this.nodeMap.has(id);
  }

  get(id: TaskId): TaskNode | undefined {
    return this.nodeMap.get(id);
  }

  /**
   * Nodes in (workspace, task) order
   */
  nodes(): TaskNode[] {
    return Array.from(this.nodeMap.values()).sort(compareNodes);
  }

  ids(): TaskId[] {
    return this.nodes().map((node) => node.id);
  }

  dependenciesOf(id: TaskId): TaskId[] {
    return this.sortIds(this.dependencyMap.get(id));
  }

  dependentsOf(id: TaskId): TaskId[] {
    return this.sortIds(this.dependentMap.get(id));
  }

  /**
   * Every instance reachable through dependent edges, sorted
   */
  transitiveDependents(id: TaskId): TaskId[] {
    const seen = new Set<TaskId>();
    const stack = [...(this.dependentMap.get(id) ?? [])];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      stack.push(...(this.dependentMap.get(current) ?? []));
    }
    return this.sortIds(seen);
  }

  /**
   * First cycle found by a depth-first walk in node order, or undefined
   */
  findCycle(): TaskId[] | undefined {
    const WHITE = 0;
    const GREY = 1;
    const BLACK = 2;
    const color = new Map<TaskId, number>();
    const path: TaskId[] = [];

    const visit = (id: TaskId): TaskId[] | undefined => {
      color.set(id, GREY);
      path.push(id);

      for (const next of this.dependentsOf(id)) {
        const state = color.get(next) ?? WHITE;
        if (state === GREY) {
          return [...path.slice(path.indexOf(next)), next];
        }
        if (state === WHITE) {
          const cycle = visit(next);
          if (cycle) return cycle;
        }
      }

      path.pop();
      color.set(id, BLACK);
      return undefined;
    };

    for (const id of this.ids()) {
      if ((color.get(id) ?? WHITE) === WHITE) {
        const cycle = visit(id);
        if (cycle) return cycle;
      }
    }
    return undefined;
  }

  /**
   * Kahn's algorithm; among ready nodes the smallest (workspace, task)
   * goes first so the order is reproducible
   *
   * @throws CycleError if the graph has a cycle
   */
  topologicalOrder(): TaskId[] {
    const remaining = new Map<TaskId, number>();
    for (const [id, deps] of this.dependencyMap) {
      remaining.set(id, deps.size);
    }

    const ready = this.nodes().filter((node) => remaining.get(node.id) === 0);
    const order: TaskId[] = [];

    while (ready.length > 0) {
      const node = ready.shift();
      if (!node) break;
      order.push(node.id);

      for (const dependent of this.dependentMap.get(node.id) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        const dependentNode = this.nodeMap.get(dependent);
        if (left === 0 && dependentNode) {
          insertSorted(ready, dependentNode);
        }
      }
    }

    if (order.length !== this.nodeMap.size) {
      throw new CycleError(this.findCycle() ?? []);
    }
    return order;
  }

  private sortIds(ids: Iterable<TaskId> | undefined): TaskId[] {
    if (!ids) return [];
    const nodes: TaskNode[] = [];
    for (const id of ids) {
      const node = this.nodeMap.get(id);
      if (node) nodes.push(node);
    }
    return nodes.sort(compareNodes).map((node) => node.id);
  }
}

export function insertSorted(queue: TaskNode[], node: TaskNode): void {
  let index = queue.findIndex((other) => compareNodes(node, other) < 0);
  if (index === -1) index = queue.length;
  queue.splice(index, 0, node);
}
