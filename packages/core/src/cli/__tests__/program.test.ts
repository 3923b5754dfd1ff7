import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { createProgram } from '../program.js';
import { Hopper } from '../../hopper.js';
import type { DryRunReport } from '../../hopper.js';
import { createTempDir, removeDir, writeMonorepo } from '../../__tests__/test-helpers.js';

interface Captured {
  stdout: string;
  stderr: string;
  exitCode?: number;
}

describe('hopper CLI', () => {
  let root: string;

  async function cli(...args: string[]): Promise<Captured> {
    const captured: Captured = { stdout: '', stderr: '' };
    const program = createProgram({
      cwd: root,
      env: { PATH: process.env.PATH, HOPPER_LOG_LEVEL: 'error' },
      stdout: { write: (text: string) => (captured.stdout += text) },
      stderr: { write: (text: string) => (captured.stderr += text) },
      setExitCode: (code) => {
        captured.exitCode = code;
      },
    });
    program.exitOverride();
    await program.parseAsync(args, { from: 'user' });
    return captured;
  }

  const lines = (text: string) => text.split('\n');

  beforeEach(async () => {
    root = await createTempDir('hopper-cli-test-');
    await writeMonorepo(root, {
      packages: {
        'packages/ui': { name: 'ui', scripts: { build: 'echo building ui', check: 'exit 1' } },
        'packages/web': {
          name: 'web',
          scripts: { build: 'echo building web', check: 'echo checked' },
          dependencies: { ui: '*' },
        },
      },
      pipeline: {
        tasks: {
          build: { dependsOn: ['^build'] },
          check: { dependsOn: ['^check'], cache: false },
        },
      },
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  describe('run', () => {
    it('should run tasks with prefixed output and a summary', async () => {
      const result = await cli('run', 'build');

      expect(lines(result.stdout)).toContain('ui#build: building ui');
      expect(lines(result.stdout)).toContain('web#build: building web');
      expect(lines(result.stdout)).toContain('  Tasks:  2 successful, 2 total');
      expect(lines(result.stdout)).toContain(' Cached:  0 cached, 2 total');
      expect(result.exitCode).toBeUndefined();
    });

    it('should replay from the local cache on the next run', async () => {
      await cli('run', 'build');

      const result = await cli('run', 'build');

      expect(lines(result.stdout)).toContain(' Cached:  2 cached, 2 total');
      expect(await readdir(join(root, '.hopper', 'cache'))).toHaveLength(2);
    });

    it('should ignore the cache with --force', async () => {
      await cli('run', 'build');

      const result = await cli('run', 'build', '--force');

      expect(lines(result.stdout)).toContain(' Cached:  0 cached, 2 total');
    });

    it('should not write the cache with --no-cache', async () => {
      await cli('run', 'build', '--no-cache');

      const result = await cli('run', 'build');

      expect(lines(result.stdout)).toContain(' Cached:  0 cached, 2 total');
    });

    it('should honour a custom cache directory', async () => {
      await cli('run', 'build', '--cache-dir', 'tmp-cache');

      expect(await readdir(join(root, 'tmp-cache'))).toHaveLength(2);
    });

    it('should exit with 1 and list failures', async () => {
      const result = await cli('run', 'check');

      expect(result.exitCode).toBe(1);
      expect(lines(result.stdout)).toContain(' Failed:  ui#check');
      expect(lines(result.stdout)).toContain('Skipped:  web#check');
    });

    it('should restrict workspaces with --filter', async () => {
      const result = await cli('run', 'build', '--filter', 'ui', '--dry-run=json');

      const report: DryRunReport = JSON.parse(result.stdout);
      expect(report.packages).toEqual(['ui']);
      expect(report.tasks.map((t) => t.taskId)).toEqual(['ui#build']);
    });

    it('should print a text dry run', async () => {
      const result = await cli('run', 'build', '--dry-run');

      expect(lines(result.stdout)).toContain('Packages in scope: ui, web');
      expect(lines(result.stdout)).toContain('  Command      = echo building web');
      expect(lines(result.stdout)).toContain('  Dependencies = ui#build');
      expect(lines(result.stdout)).not.toContain('ui#build: building ui');
    });

    it('should report planning errors', async () => {
      const result = await cli('run', 'deploy');

      expect(result.stderr).toBe("hopper: Could not find task 'deploy' in the pipeline\n");
      expect(result.exitCode).toBe(1);
    });

    it('should close the runner after a dry run and after a planning error', async () => {
      const close = vi.spyOn(Hopper.prototype, 'close');

      await cli('run', 'build', '--dry-run');
      expect(close).toHaveBeenCalledTimes(1);

      await cli('run', 'deploy');
      expect(close).toHaveBeenCalledTimes(2);
    });

    it('should reject unknown kill policies', async () => {
      const result = await cli('run', 'build', '--kill-policy', 'eventually');

      expect(result.stderr).toBe(
        "hopper: Invalid kill policy 'eventually': expected graceful, immediate, wait\n"
      );
      expect(result.exitCode).toBe(1);
    });

    it('should reject invalid concurrency', async () => {
      const result = await cli('run', 'build', '--concurrency', 'lots');

      expect(result.stderr).toBe('hopper: Invalid Hopper configuration\n');
      expect(result.exitCode).toBe(1);
    });
  });

  describe('ls', () => {
    it('should list workspaces with their paths', async () => {
      const result = await cli('ls');

      expect(result.stdout).toBe('ui packages/ui\nweb packages/web\n');
    });

    it('should apply filters', async () => {
      const result = await cli('ls', '--filter', '...ui');

      expect(result.stdout).toBe('ui packages/ui\nweb packages/web\n');
    });
  });
});
