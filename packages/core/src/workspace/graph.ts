import type { Workspace } from '../types.js';
import { ROOT_WORKSPACE } from './schema.js';

/**
 * WorkspaceGraph - Immutable view over discovered workspaces and their
 * internal dependency edges
 */
export class WorkspaceGraph {
  private workspaces: Map<string, Workspace>;
  private dependentsIndex: Map<string, string[]> = new Map();

  constructor(workspaces: Workspace[]) {
    const sorted = [...workspaces].sort((a, b) => compareNames(a.name, b.name));
    this.workspaces = new Map(sorted.map((ws) => [ws.name, Object.freeze({ ...ws })]));

    for (const ws of sorted) {
      this.dependentsIndex.set(ws.name, []);
    }
    for (const ws of sorted) {
      for (const dep of ws.dependencies) {
        this.dependentsIndex.get(dep)?.push(ws.name);
      }
    }
  }

  get root(): Workspace | undefined {
    return this.workspaces.get(ROOT_WORKSPACE);
  }

  get size(): number {
    return this.workspaces.size;
  }

  has(name: string): boolean {
    return this.workspaces.has(name);
  }

  get(name: string): Workspace | undefined {
    return this.workspaces.get(name);
  }

  /**
   * All workspace names, sorted
   */
  names(): string[] {
    return Array.from(this.workspaces.keys());
  }

  /**
   * Workspaces excluding the root
   */
  list(): Workspace[] {
    return Array.from(this.workspaces.values()).filter((ws) => ws.name !== ROOT_WORKSPACE);
  }

  /**
   * Direct internal dependencies
   */
  dependencies(name: string): readonly string[] {
    return this.workspaces.get(name)?.dependencies ?? [];
  }

  /**
   * Workspaces that directly depend on `name`
   */
  dependents(name: string): readonly string[] {
    return this.dependentsIndex.get(name) ?? [];
  }

  transitiveDependencies(name: string): string[] {
    return this.walk(name, (n) => this.dependencies(n));
  }

  transitiveDependents(name: string): string[] {
    return this.walk(name, (n) => this.dependents(n));
  }

  private walk(start: string, next: (name: string) => readonly string[]): string[] {
    const seen = new Set<string>();
    const stack = [...next(start)];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current) || current === start) continue;
      seen.add(current);
      stack.push(...next(current));
    }
    return [...seen].sort(compareNames);
  }
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
