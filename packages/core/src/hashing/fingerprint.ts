import { createHash } from 'crypto';
import type { TaskId } from '../types.js';
import { sortRecord } from './file-hasher.js';

/**
 * Bumped whenever the fields below change meaning, so old entries miss
 */
export const FINGERPRINT_VERSION = '1';

const FINGERPRINT_LENGTH = 16;

export interface FingerprintInput {
  taskId: TaskId;
  command?: string;
  /** Hash of global dependencies and global env */
  global: string;
  /** Input path -> git blob hash */
  files: Record<string, string>;
  /** Variable name -> sha256 of its value */
  env: Record<string, string>;
  outputs: string[];
  /** Upstream task id -> its fingerprint */
  dependencies: Record<TaskId, string>;
}

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val && typeof val === 'object' && !Array.isArray(val)) {
      return Object.fromEntries(
        Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return val;
  });
}

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Cache key of a task instance
 *
 * Key order is irrelevant (canonical JSON); `outputs` keeps its order
 * because a `!` glob only applies to the globs before it.
 */
export function computeFingerprint(input: FingerprintInput): string {
  const payload = {
    version: FINGERPRINT_VERSION,
    global: input.global,
    task: input.taskId,
    command: input.command ?? null,
    files: input.files,
    env: input.env,
    outputs: input.outputs,
    dependencies: input.dependencies,
  };
  return sha256(canonicalJson(payload)).slice(0, FINGERPRINT_LENGTH);
}

/**
 * Hash the variables named by `patterns`
 *
 * `NAME` always participates (unset hashes as the empty string);
 * `PREFIX_*` participates with every variable currently set under it.
 */
export function hashEnv(
  patterns: string[],
  env: Record<string, string | undefined>
): Record<string, string> {
  const hashed: Record<string, string> = {};

  for (const pattern of patterns) {
    if (pattern.endsWith('*')) {
      const prefix = pattern.slice(0, -1);
      for (const [name, value] of Object.entries(env)) {
        if (name.startsWith(prefix) && value !== undefined) {
          hashed[name] = sha256(value);
        }
      }
    } else {
      hashed[pattern] = sha256(env[pattern] ?? '');
    }
  }

  return sortRecord(hashed);
}

/**
 * Hash shared by every task: global file dependencies and global env
 */
export function computeGlobalHash(files: Record<string, string>, env: Record<string, string>): string {
  return sha256(canonicalJson({ version: FINGERPRINT_VERSION, files, env }));
}
