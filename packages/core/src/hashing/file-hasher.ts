import { createHash } from 'crypto';
import { readFile, readdir, readlink } from 'fs/promises';
import { join } from 'path';
import { minimatch } from 'minimatch';
import type { Logger, Workspace } from '../types.js';

const ALWAYS_SKIPPED = new Set(['.git', 'node_modules', '.hopper']);

/**
 * Git blob hash: sha1("blob <size>\0<contents>")
 */
export function hashContents(contents: Buffer | string): string {
  const buffer = typeof contents === 'string' ? Buffer.from(contents) : contents;
  return createHash('sha1')
    .update(`blob ${buffer.length}\0`)
    .update(buffer)
    .digest('hex');
}

export async function hashFile(path: string): Promise<string> {
  return hashContents(await readFile(path));
}

export interface IgnoreRule {
  /** Repo-relative directory holding the .gitignore, '' for the root */
  base: string;
  pattern: string;
  negated: boolean;
  dirOnly: boolean;
}

/**
 * Parse .gitignore text into rules scoped to `base`
 */
export function parseIgnoreFile(text: string, base: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.replace(/\s+$/, '');
    if (!line || line.startsWith('#')) continue;

    const negated = line.startsWith('!');
    if (negated) line = line.slice(1);

    const dirOnly = line.endsWith('/');
    if (dirOnly) line = line.replace(/\/+$/, '');

    // A slash anywhere but the end anchors the pattern to `base`
    const anchored = line.includes('/');
    line = line.replace(/^\//, '');
    if (!line) continue;

    rules.push({ base, pattern: anchored ? line : `**/${line}`, negated, dirOnly });
  }

  return rules;
}

/**
 * Last matching rule wins, as in git
 */
export function isIgnored(rules: IgnoreRule[], repoPath: string, isDir: boolean): boolean {
  let ignored = false;

  for (const rule of rules) {
    if (rule.dirOnly && !isDir) continue;

    let relative = repoPath;
    if (rule.base) {
      if (!repoPath.startsWith(`${rule.base}/`)) continue;
      relative = repoPath.slice(rule.base.length + 1);
    }

    if (minimatch(relative, rule.pattern, { dot: true })) {
      ignored = !rule.negated;
    }
  }

  return ignored;
}

export interface HashOptions {
  /** Include globs; a leading `!` excludes. No includes means every file. */
  inputs?: string[];
  /** Extra exclusion globs, e.g. the task's own outputs */
  excludes?: string[];
  /** Repo-relative directories not to descend into */
  skipDirs?: string[];
}

/**
 * FileHasher - Hashes the files of a workspace the way git would
 *
 * Honours .gitignore files from the repository root down, never follows
 * symlinks (a link is hashed by its target string).
 */
export class FileHasher {
  private rootDir: string;
  private logger?: Logger;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = rootDir;
    this.logger = logger;
  }

  /**
   * @returns workspace-relative POSIX path -> hash, sorted by path
   */
  async hashWorkspace(workspace: Workspace, options: HashOptions = {}): Promise<Record<string, string>> {
    return this.hashTree(workspace.path, options);
  }

  /**
   * Hash root-relative files matching globs
   */
  async hashGlobalDependencies(globs: string[]): Promise<Record<string, string>> {
    if (globs.length === 0) return {};
    return this.hashTree('', { inputs: globs });
  }

  private async hashTree(basePath: string, options: HashOptions): Promise<Record<string, string>> {
    const inputs = options.inputs ?? [];
    const includes = inputs.filter((p) => !p.startsWith('!'));
    const excludes = [
      ...inputs.filter((p) => p.startsWith('!')).map((p) => p.slice(1)),
      ...(options.excludes ?? []).filter((p) => !p.startsWith('!')),
    ];
    const skipDirs = new Set(options.skipDirs ?? []);

    const rules = await this.ancestorRules(basePath);
    const hashes: Record<string, string> = {};

    const walk = async (repoDir: string, rules: IgnoreRule[]): Promise<void> => {
      const absDir = repoDir ? join(this.rootDir, repoDir) : this.rootDir;
      const entries = await readdir(absDir, { withFileTypes: true });

      // ancestorRules already holds the .gitignore of basePath itself
      const local =
        repoDir !== basePath && entries.some((e) => e.isFile() && e.name === '.gitignore')
          ? parseIgnoreFile(await readFile(join(absDir, '.gitignore'), 'utf-8'), repoDir)
          : [];
      const scoped = local.length > 0 ? [...rules, ...local] : rules;

      for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
        const repoPath = repoDir ? `${repoDir}/${entry.name}` : entry.name;

        if (entry.isDirectory()) {
          if (ALWAYS_SKIPPED.has(entry.name) || skipDirs.has(repoPath)) continue;
          if (isIgnored(scoped, repoPath, true)) continue;
          await walk(repoPath, scoped);
          continue;
        }

        if (!entry.isFile() && !entry.isSymbolicLink()) continue;
        if (isIgnored(scoped, repoPath, false)) continue;

        const relative = basePath ? repoPath.slice(basePath.length + 1) : repoPath;
        if (includes.length > 0 && !includes.some((p) => minimatch(relative, p, { dot: true }))) continue;
        if (excludes.some((p) => minimatch(relative, p, { dot: true }))) continue;

        const absPath = join(this.rootDir, repoPath);
        hashes[relative] = entry.isSymbolicLink()
          ? hashContents(await readlink(absPath))
          : await hashFile(absPath);
      }
    };

    await walk(basePath, rules);

    this.logger?.debug('Hashed files', { path: basePath || '.', count: Object.keys(hashes).length });

    return sortRecord(hashes);
  }

  /**
   * .gitignore rules of the root and every directory down to basePath
   */
  private async ancestorRules(basePath: string): Promise<IgnoreRule[]> {
    const dirs = [''];
    if (basePath) {
      const parts = basePath.split('/');
      for (let i = 1; i <= parts.length; i++) {
        dirs.push(parts.slice(0, i).join('/'));
      }
    }

    const rules: IgnoreRule[] = [];
    for (const dir of dirs) {
      try {
        const text = await readFile(join(this.rootDir, dir, '.gitignore'), 'utf-8');
        rules.push(...parseIgnoreFile(text, dir));
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
      }
    }
    return rules;
  }
}

export function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}
