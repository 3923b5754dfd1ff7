import { readFile, readdir } from 'fs/promises';
import { join, resolve } from 'path';
import { minimatch } from 'minimatch';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import type { Logger, Workspace } from '../types.js';
import {
  DEPENDENCY_FIELDS,
  PackageManifestSchema,
  PnpmWorkspaceSchema,
  ROOT_WORKSPACE,
  RootManifestSchema,
  type PackageManifest,
  type RootManifest,
} from './schema.js';
import { WorkspaceGraph } from './graph.js';

const SKIPPED_DIRS = new Set(['node_modules', '.git', '.hopper']);

/**
 * Raised when workspace declarations are malformed or ambiguous
 */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    public path?: string,
    public issues?: z.ZodIssue[]
  ) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

interface FoundManifest {
  path: string;
  manifest: PackageManifest;
}

/**
 * WorkspaceDiscovery - Finds the packages of a monorepo
 *
 * Workspace globs come from the root package.json `workspaces` field, or
 * from pnpm-workspace.yaml when package.json declares none.
 *
 * @example
 * ```typescript
 * const graph = await new WorkspaceDiscovery(logger).discover('/repo');
 * graph.dependencies('web'); // ['ui', 'utils']
 * ```
 */
export class WorkspaceDiscovery {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async discover(rootDir: string): Promise<WorkspaceGraph> {
    const root = resolve(rootDir);
    const rootManifest = await this.readRootManifest(root);
    const patterns = await this.workspacePatterns(root, rootManifest);

    this.logger?.debug('Discovering workspaces', { root, patterns });

    const found = patterns.length > 0 ? await this.findManifests(root, patterns) : [];
    const byName = new Map<string, FoundManifest>();

    for (const entry of found) {
      const name = entry.manifest.name;
      if (name === ROOT_WORKSPACE) {
        throw new DiscoveryError(`Workspace at ${entry.path} uses the reserved name '//'`, entry.path);
      }
      const existing = byName.get(name);
      if (existing) {
        throw new DiscoveryError(
          `Duplicate workspace name '${name}' at ${existing.path} and ${entry.path}`,
          entry.path
        );
      }
      byName.set(name, entry);
    }

    const workspaces: Workspace[] = [
      this.toWorkspace(root, ROOT_WORKSPACE, '', rootManifest, byName),
    ];
    for (const [name, entry] of byName) {
      workspaces.push(this.toWorkspace(root, name, entry.path, entry.manifest, byName));
    }

    this.logger?.info(`Discovered ${byName.size} workspaces`);

    return new WorkspaceGraph(workspaces);
  }

  private async readRootManifest(root: string): Promise<RootManifest> {
    const path = join(root, 'package.json');
    const data = await this.readJson(path, 'package.json');
    const result = RootManifestSchema.safeParse(data);
    if (!result.success) {
      throw new DiscoveryError('Invalid root package.json', 'package.json', result.error.issues);
    }
    return result.data;
  }

  private async workspacePatterns(root: string, manifest: RootManifest): Promise<string[]> {
    if (manifest.workspaces) {
      return Array.isArray(manifest.workspaces)
        ? manifest.workspaces
        : manifest.workspaces.packages;
    }

    let raw: string;
    try {
      raw = await readFile(join(root, 'pnpm-workspace.yaml'), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw) ?? {};
    } catch (error) {
      throw new DiscoveryError(
        `Failed to parse pnpm-workspace.yaml: ${error instanceof Error ? error.message : 'Unknown'}`,
        'pnpm-workspace.yaml'
      );
    }
    const result = PnpmWorkspaceSchema.safeParse(parsed);
    if (!result.success) {
      throw new DiscoveryError('Invalid pnpm-workspace.yaml', 'pnpm-workspace.yaml', result.error.issues);
    }
    return result.data.packages;
  }

  /**
   * Walk the tree and collect package.json files in directories matching
   * the workspace globs
   */
  private async findManifests(root: string, patterns: string[]): Promise<FoundManifest[]> {
    const includes = patterns.filter((p) => !p.startsWith('!')).map(normalizePattern);
    const excludes = patterns.filter((p) => p.startsWith('!')).map((p) => normalizePattern(p.slice(1)));

    const matches = (dir: string) =>
      includes.some((p) => minimatch(dir, p)) && !excludes.some((p) => minimatch(dir, p));

    const found: FoundManifest[] = [];

    const walk = async (relDir: string): Promise<void> => {
      const absDir = relDir ? join(root, relDir) : root;
      const entries = await readdir(absDir, { withFileTypes: true });

      if (relDir && matches(relDir) && entries.some((e) => e.isFile() && e.name === 'package.json')) {
        const data = await this.readJson(join(absDir, 'package.json'), `${relDir}/package.json`);
        const result = PackageManifestSchema.safeParse(data);
        if (!result.success) {
          throw new DiscoveryError(
            `Invalid package.json in ${relDir}: ${result.error.issues
              .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
              .join('; ')}`,
            relDir,
            result.error.issues
          );
        }
        found.push({ path: relDir, manifest: result.data });
      }

      const dirs = entries
        .filter((e) => e.isDirectory() && !SKIPPED_DIRS.has(e.name) && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();

      for (const name of dirs) {
        await walk(relDir ? `${relDir}/${name}` : name);
      }
    };

    await walk('');
    return found;
  }

  private async readJson(path: string, label: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new DiscoveryError(`Missing ${label}`, label);
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new DiscoveryError(
        `Failed to parse ${label}: ${error instanceof Error ? error.message : 'Unknown'}`,
        label
      );
    }
  }

  private toWorkspace(
    root: string,
    name: string,
    path: string,
    manifest: Omit<PackageManifest, 'name'>,
    known: Map<string, FoundManifest>
  ): Workspace {
    const dependencies = new Set<string>();
    for (const field of DEPENDENCY_FIELDS) {
      for (const dep of Object.keys(manifest[field] ?? {})) {
        if (dep !== name && known.has(dep)) {
          dependencies.add(dep);
        }
      }
    }

    return {
      name,
      path,
      absolutePath: path ? join(root, path) : root,
      scripts: { ...(manifest.scripts ?? {}) },
      dependencies: [...dependencies].sort(),
    };
  }
}

/**
 * Strip a leading `./` and trailing slashes from a workspace glob
 */
function normalizePattern(pattern: string): string {
  return pattern.replace(/^\.\//, '').replace(/\/+$/, '');
}
