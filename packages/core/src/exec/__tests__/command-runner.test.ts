/**
 * Tests for CommandRunner - shell execution with cancellation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CommandRunner } from '../command-runner.js';
import type { RunRequest } from '../command-runner.js';
import { createTempDir, removeDir, writeFiles } from '../../__tests__/test-helpers.js';

describe('CommandRunner', () => {
  let runner: CommandRunner;
  let testDir: string;

  const request = (command: string, overrides: Partial<RunRequest> = {}): RunRequest => ({
    taskId: 'pkg#task',
    command,
    cwd: testDir,
    env: { PATH: process.env.PATH },
    ...overrides,
  });

  beforeEach(async () => {
    runner = new CommandRunner();
    testDir = await createTempDir('hopper-cmd-test-');
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe('Configuration', () => {
    it('should use defaults', () => {
      expect(runner.getConfig()).toEqual({
        timeout: 0,
        killPolicy: 'graceful',
        gracePeriodMs: 5000,
        maxBuffer: 10 * 1024 * 1024,
      });
    });

    it('should accept overrides', () => {
      const custom = new CommandRunner({ killPolicy: 'immediate', gracePeriodMs: 100 });

      expect(custom.getConfig()).toMatchObject({ killPolicy: 'immediate', gracePeriodMs: 100 });
    });
  });

  describe('Execution', () => {
    it('should capture stdout of a successful command', async () => {
      const result = await runner.run(request('echo hello'));

      expect(result).toMatchObject({
        success: true,
        stdout: 'hello\n',
        output: 'hello\n',
        exitCode: 0,
        timedOut: false,
        cancelled: false,
      });
      expect(result.error).toBeUndefined();
    });

    it('should capture stderr alongside stdout', async () => {
      const result = await runner.run(request('echo oops 1>&2'));

      expect(result.stderr).toBe('oops\n');
      expect(result.output).toBe('oops\n');
    });

    it('should report non-zero exit codes', async () => {
      const result = await runner.run(request('exit 3'));

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(3);
      expect(result.error).toBe('Command exited with code 3');
    });

    it('should run in the requested directory with the requested env', async () => {
      await writeFiles(testDir, { 'marker.txt': 'here\n' });

      const result = await runner.run(
        request('cat marker.txt && echo "$GREETING"', {
          env: { PATH: process.env.PATH, GREETING: 'hi' },
        })
      );

      expect(result.stdout).toBe('here\nhi\n');
    });

    it('should stream output as it arrives', async () => {
      const chunks: string[] = [];

      await runner.run(request('echo one; echo two', { onOutput: (chunk) => chunks.push(chunk) }));

      expect(chunks.join('')).toBe('one\ntwo\n');
    });

    it('should decode characters split across output chunks', async () => {
      const chunks: string[] = [];

      const result = await runner.run(
        request("printf '\\303'; sleep 0.3; printf '\\251\\n'", { onOutput: (chunk) => chunks.push(chunk) })
      );

      expect(result.stdout).toBe('é\n');
      expect(result.output).toBe('é\n');
      expect(chunks.join('')).toBe('é\n');
    });

    it('should stop commands that exceed the timeout', async () => {
      const timed = new CommandRunner({ timeout: 100, gracePeriodMs: 100 });

      const result = await timed.run(request('sleep 5'));

      expect(result.timedOut).toBe(true);
      expect(result.success).toBe(false);
      expect(result.error).toBe('Command timed out after 100ms');
    });
  });

  describe('Cancellation', () => {
    it('should not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await runner.run(request('echo never', { signal: controller.signal }));

      expect(result).toMatchObject({ cancelled: true, success: false, error: 'Cancelled before start' });
    });

    it('should kill immediately under the immediate policy', async () => {
      const immediate = new CommandRunner({ killPolicy: 'immediate' });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      const result = await immediate.run(request('sleep 5', { signal: controller.signal }));

      expect(result.cancelled).toBe(true);
      expect(result.success).toBe(false);
      expect(result.duration).toBeLessThan(4000);
    });

    it('should send SIGTERM first under the graceful policy', async () => {
      const graceful = new CommandRunner({ killPolicy: 'graceful', gracePeriodMs: 2000 });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      const result = await graceful.run(request('sleep 5', { signal: controller.signal }));

      expect(result.cancelled).toBe(true);
      expect(result.signal).toBe('SIGTERM');
      expect(result.error).toBe('Command cancelled');
    });

    it('should let commands finish under the wait policy', async () => {
      const waiting = new CommandRunner({ killPolicy: 'wait' });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);

      const result = await waiting.run(request('sleep 0.2; echo done', { signal: controller.signal }));

      expect(result).toMatchObject({ success: true, cancelled: false, stdout: 'done\n' });
    });
  });
});
