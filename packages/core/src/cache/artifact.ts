import { chmod, lstat, mkdir, readFile, readdir, readlink, realpath, rm, symlink, writeFile } from 'fs/promises';
import type { Dirent } from 'fs';
import { basename, dirname, isAbsolute, join, posix, relative, resolve, sep } from 'path';
import { minimatch } from 'minimatch';
import type { CachedFile } from './types.js';
import { CacheError } from './types.js';

const SKIPPED_DIRS = new Set(['node_modules', '.git', '.hopper']);

export interface NameValidation {
  wellFormed: boolean;
  windowsSafe: boolean;
}

/**
 * Classify an archive entry name
 *
 * Not well formed: empty, `.`, `..`, starting with `/`, `./` or `../`,
 * ending with `/.` or `/..`, containing `//`, `/./` or `/../`.
 * Not windows safe: containing a backslash.
 */
export function checkName(name: string): NameValidation {
  if (name === '') {
    return { wellFormed: false, windowsSafe: false };
  }

  let wellFormed = true;
  if (name === '.' || name === '..') wellFormed = false;
  if (name.startsWith('/') || name.startsWith('./') || name.startsWith('../')) wellFormed = false;
  if (name.endsWith('/.') || name.endsWith('/..')) wellFormed = false;
  if (name.includes('//') || name.includes('/./') || name.includes('/../')) wellFormed = false;

  return { wellFormed, windowsSafe: !name.includes('\\') };
}

/**
 * Validate a name and strip its trailing slash
 *
 * @throws CacheError (MALFORMED_NAME / WINDOWS_UNSAFE_NAME)
 */
export function canonicalizeName(name: string): string {
  const { wellFormed, windowsSafe } = checkName(name);
  if (!wellFormed) {
    throw new CacheError(`Malformed name in cache artifact: ${name}`, 'MALFORMED_NAME');
  }
  if (process.platform === 'win32' && !windowsSafe) {
    throw new CacheError(`Name is not safe on windows: ${name}`, 'WINDOWS_UNSAFE_NAME');
  }
  return name.replace(/\/+$/, '');
}

function isInside(anchor: string, path: string): boolean {
  const rel = relative(anchor, path);
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Capture the files matching output globs under `anchor`
 *
 * Directories leading to captured entries are recorded before their
 * contents so a restore can create them in order.
 */
export async function collectOutputs(anchor: string, globs: string[]): Promise<CachedFile[]> {
  const includes = globs.filter((g) => !g.startsWith('!'));
  const excludes = globs.filter((g) => g.startsWith('!')).map((g) => g.slice(1));
  if (includes.length === 0) return [];

  const matches = (path: string) =>
    includes.some((g) => minimatch(path, g, { dot: true })) &&
    !excludes.some((g) => minimatch(path, g, { dot: true }));

  const files: CachedFile[] = [];
  const dirs = new Set<string>();

  const addParents = (path: string) => {
    const parts = path.split('/');
    for (let i = 1; i < parts.length; i++) {
      dirs.add(parts.slice(0, i).join('/'));
    }
  };

  const walk = async (relDir: string): Promise<void> => {
    const absDir = relDir ? join(anchor, relDir) : anchor;
    let entries: Dirent[];
    try {
      entries = await readdir(absDir, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return;
      throw error;
    }

    for (const entry of entries) {
      const path = relDir ? `${relDir}/${entry.name}` : entry.name;
      const absPath = join(anchor, path);

      if (entry.isDirectory()) {
        if (SKIPPED_DIRS.has(entry.name)) continue;
        await walk(path);
      } else if (entry.isSymbolicLink()) {
        if (!matches(path)) continue;
        files.push({ type: 'symlink', path, target: await readlink(absPath) });
        addParents(path);
      } else if (entry.isFile()) {
        if (!matches(path)) continue;
        const stats = await lstat(absPath);
        files.push({
          type: 'file',
          path,
          content: (await readFile(absPath)).toString('base64'),
          mode: stats.mode & 0o777,
        });
        addParents(path);
      }
    }
  };

  await walk('');

  const all: CachedFile[] = [
    ...[...dirs].map((path): CachedFile => ({ type: 'directory', path })),
    ...files,
  ];
  return all.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

type CachedSymlink = Extract<CachedFile, { type: 'symlink' }>;

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Create `dir` (and its missing parents) under `root`, following only
 * links that resolve inside it
 *
 * @returns the real path of `dir`
 */
async function ensureRealDir(root: string, dir: string, name: string): Promise<string> {
  let existing = dir;
  while (!(await exists(existing))) {
    existing = dirname(existing);
  }

  const escapes = () =>
    new CacheError(`Cache entry ${name} resolves outside the output directory`, 'LINK_OUTSIDE_ANCHOR');

  if (!isInside(root, await realpath(existing))) throw escapes();
  await mkdir(dir, { recursive: true });

  const real = await realpath(dir);
  if (!isInside(root, real)) throw escapes();
  return real;
}

/** Names of artifact links that `link` needs in place before it can be created */
function linkDependencies(link: CachedSymlink, names: Set<string>): string[] {
  const name = canonicalizeName(link.path);
  const target = posix.normalize(posix.join(posix.dirname(name), link.target));
  const deps: string[] = [];
  for (const other of names) {
    const before = (path: string) => path === other || path.startsWith(`${other}/`);
    if ((other !== name && before(name)) || before(target)) deps.push(other);
  }
  return deps.sort();
}

/**
 * Order links so each one comes after the links its path and target go through
 *
 * @throws CacheError (LINK_CYCLE)
 */
function orderLinks(links: CachedSymlink[]): CachedSymlink[] {
  const byName = new Map(links.map((link) => [canonicalizeName(link.path), link]));
  const names = new Set(byName.keys());
  const ordered: CachedSymlink[] = [];
  const state = new Map<string, 'visiting' | 'done'>();

  const visit = (name: string, link: CachedSymlink): void => {
    const seen = state.get(name);
    if (seen === 'done') return;
    if (seen === 'visiting') {
      throw new CacheError(`Links in the cache are cyclic: ${name}`, 'LINK_CYCLE');
    }
    state.set(name, 'visiting');
    for (const dep of linkDependencies(link, names)) {
      const next = byName.get(dep);
      if (next) visit(dep, next);
    }
    state.set(name, 'done');
    ordered.push(link);
  };

  for (const [name, link] of byName) visit(name, link);
  return ordered;
}

/**
 * Write captured outputs back under `anchor`
 *
 * Directories and files are written first, in artifact order, then links in
 * dependency order. Every parent is resolved on disk and must stay inside
 * the real anchor.
 *
 * @returns the restored names
 * @throws CacheError for malformed names, cyclic links or entries leaving the anchor
 */
export async function restoreOutputs(anchor: string, files: CachedFile[]): Promise<string[]> {
  await mkdir(resolve(anchor), { recursive: true });
  const root = await realpath(resolve(anchor));
  const restored: string[] = [];
  const links: CachedSymlink[] = [];

  for (const file of files) {
    const name = canonicalizeName(file.path);
    const dest = join(root, name);
    if (!isInside(root, dest)) {
      throw new CacheError(`Cache entry escapes output directory: ${file.path}`, 'MALFORMED_NAME');
    }

    switch (file.type) {
      case 'directory':
        await ensureRealDir(root, dest, name);
        break;
      case 'file': {
        const parent = await ensureRealDir(root, dirname(dest), name);
        const real = join(parent, basename(dest));
        await rm(real, { force: true });
        await writeFile(real, Buffer.from(file.content, 'base64'));
        await chmod(real, file.mode);
        break;
      }
      case 'symlink':
        links.push(file);
        continue;
    }

    restored.push(name);
  }

  for (const link of orderLinks(links)) {
    const name = canonicalizeName(link.path);
    const parent = await ensureRealDir(root, dirname(join(root, name)), name);
    const target = resolve(parent, link.target);
    if (isAbsolute(link.target) || !isInside(root, target)) {
      throw new CacheError(
        `Symlink ${link.path} points outside the output directory: ${link.target}`,
        'LINK_OUTSIDE_ANCHOR'
      );
    }
    if ((await exists(target)) && !isInside(root, await realpath(target))) {
      throw new CacheError(
        `Symlink ${link.path} resolves outside the output directory: ${link.target}`,
        'LINK_OUTSIDE_ANCHOR'
      );
    }

    const dest = join(parent, basename(name));
    if ((await exists(dest)) && (await lstat(dest)).isDirectory()) {
      throw new CacheError(`Cannot replace directory ${name} with a symlink`, 'LINK_OVER_DIRECTORY');
    }
    await rm(dest, { force: true });
    await symlink(link.target, dest);
    restored.push(name);
  }

  return restored;
}
