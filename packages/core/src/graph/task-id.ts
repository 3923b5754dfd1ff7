import type { TaskId } from '../types.js';
import { ROOT_WORKSPACE } from '../workspace/schema.js';

const SEPARATOR = '#';

/**
 * A parsed `dependsOn` entry
 */
export type DependencyRef =
  | { kind: 'same'; task: string }
  | { kind: 'upstream'; task: string }
  | { kind: 'root'; task: string }
  | { kind: 'workspace'; workspace: string; task: string };

export function formatTaskId(workspace: string, task: string): TaskId {
  return `${workspace}${SEPARATOR}${task}`;
}

/**
 * Split `web#build` / `//#lint`; returns undefined for a bare task name
 */
export function parseTaskId(id: string): { workspace: string; task: string } | undefined {
  const index = id.lastIndexOf(SEPARATOR);
  if (index <= 0) return undefined;
  const workspace = id.slice(0, index);
  const task = id.slice(index + 1);
  if (!task) return undefined;
  return { workspace, task };
}

export function isRootTaskId(id: string): boolean {
  return id.startsWith(`${ROOT_WORKSPACE}${SEPARATOR}`);
}

/**
 * Parse a `dependsOn` entry
 *
 * @throws Error with a human readable reason when the entry is malformed
 */
export function parseDependencyRef(raw: string): DependencyRef {
  const value = raw.trim();
  if (!value) {
    throw new Error('dependency reference is empty');
  }

  if (value.startsWith('^')) {
    const task = value.slice(1);
    if (!task) throw new Error(`'${raw}' names no task`);
    if (task.includes(SEPARATOR)) {
      throw new Error(`'${raw}' cannot combine '^' with a workspace`);
    }
    return { kind: 'upstream', task };
  }

  if (value.includes(SEPARATOR)) {
    const parsed = parseTaskId(value);
    if (!parsed) throw new Error(`'${raw}' is not a valid task id`);
    if (parsed.workspace === ROOT_WORKSPACE) {
      return { kind: 'root', task: parsed.task };
    }
    return { kind: 'workspace', workspace: parsed.workspace, task: parsed.task };
  }

  return { kind: 'same', task: value };
}
