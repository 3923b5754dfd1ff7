import { minimatch } from 'minimatch';
import type { WorkspaceGraph } from './graph.js';
import { compareNames } from './graph.js';

/**
 * Raised when an inclusion filter selects no workspace
 */
export class FilterError extends Error {
  constructor(public filter: string) {
    super(`No workspace matches filter '${filter}'`);
    this.name = 'FilterError';
  }
}

interface ParsedFilter {
  pattern: string;
  byPath: boolean;
  withDependencies: boolean;
  withDependents: boolean;
}

function parseFilter(raw: string): ParsedFilter {
  let pattern = raw.trim();
  let withDependencies = false;
  let withDependents = false;

  if (pattern.endsWith('...')) {
    withDependencies = true;
    pattern = pattern.slice(0, -3);
  }
  if (pattern.startsWith('...')) {
    withDependents = true;
    pattern = pattern.slice(3);
  }

  const byPath = pattern.startsWith('./') || pattern === '.';
  if (byPath) {
    pattern = pattern.replace(/^\.\/?/, '').replace(/\/+$/, '');
  }

  return { pattern, byPath, withDependencies, withDependents };
}

function matchOne(graph: WorkspaceGraph, raw: string): Set<string> {
  const filter = parseFilter(raw);
  const selected = new Set<string>();

  for (const ws of graph.list()) {
    const subject = filter.byPath ? ws.path : ws.name;
    if (subject === filter.pattern || minimatch(subject, filter.pattern)) {
      selected.add(ws.name);
    }
  }

  for (const name of [...selected]) {
    if (filter.withDependencies) {
      for (const dep of graph.transitiveDependencies(name)) selected.add(dep);
    }
    if (filter.withDependents) {
      for (const dep of graph.transitiveDependents(name)) selected.add(dep);
    }
  }

  return selected;
}

/**
 * Narrow the workspaces that receive the requested tasks
 *
 * - `web`, `@acme/*` - by name or name glob
 * - `web...` - with its transitive dependencies
 * - `...ui` - with its transitive dependents
 * - `./apps/*` - by directory
 * - `!docs` - exclusion, applied after every inclusion; one matching
 *   nothing removes nothing
 *
 * @returns Sorted workspace names (never the root workspace)
 */
export function selectWorkspaces(graph: WorkspaceGraph, filters: string[] = []): string[] {
  const includes = filters.filter((f) => !f.startsWith('!'));
  const excludes = filters.filter((f) => f.startsWith('!')).map((f) => f.slice(1));

  let selected: Set<string>;
  if (includes.length === 0) {
    selected = new Set(graph.list().map((ws) => ws.name));
  } else {
    selected = new Set();
    for (const filter of includes) {
      const matched = matchOne(graph, filter);
      if (matched.size === 0) {
        throw new FilterError(filter);
      }
      for (const name of matched) selected.add(name);
    }
  }

  for (const filter of excludes) {
    for (const name of matchOne(graph, filter)) selected.delete(name);
  }

  return [...selected].sort(compareNames);
}
