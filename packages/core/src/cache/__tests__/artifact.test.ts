import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, lstat, readFile, readlink, symlink } from 'fs/promises';
import { join } from 'path';
import { canonicalizeName, checkName, collectOutputs, restoreOutputs } from '../artifact.js';
import type { CachedFile } from '../types.js';
import { createTempDir, removeDir, writeFiles } from '../../__tests__/test-helpers.js';

const present = (path: string) =>
  lstat(path).then(
    () => true,
    () => false
  );

describe('checkName', () => {
  it.each([
    ['dist/index.js', true, true],
    ['dist/', true, true],
    ['', false, false],
    ['.', false, true],
    ['..', false, true],
    ['/etc/passwd', false, true],
    ['./dist', false, true],
    ['../dist', false, true],
    ['dist/.', false, true],
    ['dist/..', false, true],
    ['dist//index.js', false, true],
    ['dist/./index.js', false, true],
    ['dist/../index.js', false, true],
    ['dist\\index.js', true, false],
  ])('%j is well formed: %s, windows safe: %s', (name, wellFormed, windowsSafe) => {
    expect(checkName(name)).toEqual({ wellFormed, windowsSafe });
  });
});

describe('canonicalizeName', () => {
  it('should strip trailing slashes', () => {
    expect(canonicalizeName('dist/')).toBe('dist');
    expect(canonicalizeName('dist/index.js')).toBe('dist/index.js');
  });

  it('should reject malformed names', () => {
    expect(() => canonicalizeName('../outside')).toThrow('Malformed name in cache artifact: ../outside');
  });
});

describe('collectOutputs / restoreOutputs', () => {
  let source: string;
  let target: string;

  beforeEach(async () => {
    source = await createTempDir();
    target = await createTempDir();
    await writeFiles(source, {
      'dist/index.js': 'console.log(1);\n',
      'dist/index.js.map': '{}',
      'dist/bin/cli.js': '#!/usr/bin/env node\n',
      'src/index.ts': 'source\n',
    });
    await chmod(join(source, 'dist/bin/cli.js'), 0o755);
  });

  afterEach(async () => {
    await removeDir(source);
    await removeDir(target);
  });

  it('should capture matching files with their parent directories', async () => {
    const files = await collectOutputs(source, ['dist/**', '!dist/**/*.map']);

    expect(files.map((file) => `${file.type}:${file.path}`)).toEqual([
      'directory:dist',
      'directory:dist/bin',
      'file:dist/bin/cli.js',
      'file:dist/index.js',
    ]);
    expect(files[2]).toMatchObject({ mode: 0o755, content: Buffer.from('#!/usr/bin/env node\n').toString('base64') });
  });

  it('should capture nothing without output globs', async () => {
    expect(await collectOutputs(source, [])).toEqual([]);
  });

  it('should capture nothing when outputs do not exist', async () => {
    expect(await collectOutputs(join(source, 'missing'), ['dist/**'])).toEqual([]);
  });

  it('should restore files, modes and symlinks', async () => {
    await symlink('index.js', join(source, 'dist/main.js'));
    const files = await collectOutputs(source, ['dist/**']);

    const restored = await restoreOutputs(target, files);

    expect(restored).toEqual([
      'dist',
      'dist/bin',
      'dist/bin/cli.js',
      'dist/index.js',
      'dist/index.js.map',
      'dist/main.js',
    ]);
    expect(await readFile(join(target, 'dist/index.js'), 'utf-8')).toBe('console.log(1);\n');
    expect((await lstat(join(target, 'dist/bin/cli.js'))).mode & 0o777).toBe(0o755);
    expect(await readlink(join(target, 'dist/main.js'))).toBe('index.js');
  });

  it('should refuse names escaping the anchor', async () => {
    const files: CachedFile[] = [{ type: 'file', path: '../escape.txt', content: '', mode: 0o644 }];

    await expect(restoreOutputs(target, files)).rejects.toMatchObject({ code: 'MALFORMED_NAME' });
  });

  it('should refuse symlinks pointing outside the anchor', async () => {
    const relative: CachedFile[] = [{ type: 'symlink', path: 'dist/link', target: '../../secret' }];
    const absolute: CachedFile[] = [{ type: 'symlink', path: 'link', target: '/etc/hosts' }];

    await expect(restoreOutputs(target, relative)).rejects.toMatchObject({ code: 'LINK_OUTSIDE_ANCHOR' });
    await expect(restoreOutputs(target, absolute)).rejects.toMatchObject({ code: 'LINK_OUTSIDE_ANCHOR' });
  });

  it('should refuse a link whose real parent makes it point outside', async () => {
    const outer = await createTempDir();
    const anchor = join(outer, 'anchor');
    const files: CachedFile[] = [
      { type: 'symlink', path: 'a', target: '.' },
      { type: 'symlink', path: 'a/x', target: '..' },
      { type: 'file', path: 'x/evil', content: Buffer.from('evil').toString('base64'), mode: 0o644 },
    ];

    try {
      await expect(restoreOutputs(anchor, files)).rejects.toMatchObject({ code: 'LINK_OUTSIDE_ANCHOR' });
      expect(await present(join(outer, 'evil'))).toBe(false);
      expect(await present(join(anchor, 'x'))).toBe(true);
      expect((await lstat(join(anchor, 'x'))).isSymbolicLink()).toBe(false);
    } finally {
      await removeDir(outer);
    }
  });

  it('should refuse to write through an existing link leaving the anchor', async () => {
    const elsewhere = await createTempDir();
    await symlink(elsewhere, join(target, 'dist'));
    const files: CachedFile[] = [
      { type: 'file', path: 'dist/out.txt', content: Buffer.from('out').toString('base64'), mode: 0o644 },
    ];

    try {
      await expect(restoreOutputs(target, files)).rejects.toMatchObject({ code: 'LINK_OUTSIDE_ANCHOR' });
      expect(await present(join(elsewhere, 'out.txt'))).toBe(false);
    } finally {
      await removeDir(elsewhere);
    }
  });

  it('should restore links after the links they go through', async () => {
    const files: CachedFile[] = [
      { type: 'symlink', path: 'current', target: 'releases/latest' },
      { type: 'symlink', path: 'releases/latest', target: 'v2' },
      { type: 'file', path: 'releases/v2/app.js', content: Buffer.from('v2').toString('base64'), mode: 0o644 },
    ];

    const restored = await restoreOutputs(target, files);

    expect(restored).toEqual(['releases/v2/app.js', 'releases/latest', 'current']);
    expect(await readFile(join(target, 'current/app.js'), 'utf-8')).toBe('v2');
  });

  it('should refuse cyclic links', async () => {
    const files: CachedFile[] = [
      { type: 'symlink', path: 'one', target: 'two' },
      { type: 'symlink', path: 'two', target: 'three' },
      { type: 'symlink', path: 'three', target: 'one' },
    ];

    await expect(restoreOutputs(target, files)).rejects.toMatchObject({ code: 'LINK_CYCLE' });
    expect(await present(join(target, 'one'))).toBe(false);
  });
});
