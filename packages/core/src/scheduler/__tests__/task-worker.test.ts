import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'fs/promises';
import { delimiter, join } from 'path';
import { TaskWorker, TaskExecutionError } from '../task-worker.js';
import { WorkspaceDiscovery } from '../../workspace/discovery.js';
import type { WorkspaceGraph } from '../../workspace/graph.js';
import { PipelineLoader } from '../../pipeline/loader.js';
import { TaskGraphResolver } from '../../graph/resolver.js';
import type { TaskGraph } from '../../graph/task-graph.js';
import { FileHasher } from '../../hashing/file-hasher.js';
import { OutputCache } from '../../cache/output-cache.js';
import { InMemoryCacheBackend } from '../../cache/memory-backend.js';
import type { TaskNode } from '../../types.js';
import {
  FakeRunner,
  collectingSink,
  commandResult,
  createTempDir,
  removeDir,
  writeFiles,
  writeMonorepo,
} from '../../__tests__/test-helpers.js';

describe('TaskWorker', () => {
  let root: string;
  let backend: InMemoryCacheBackend;
  let runner: FakeRunner;
  let sink: ReturnType<typeof collectingSink>;

  const signal = new AbortController().signal;

  async function setup(tasks: object): Promise<{ graph: TaskGraph; worker: TaskWorker; workspaces: WorkspaceGraph }> {
    await writeFiles(root, { 'hopper.json': { tasks } });
    const workspaces = await new WorkspaceDiscovery().discover(root);
    const pipeline = await new PipelineLoader().load(root);
    const graph = new TaskGraphResolver().resolve({
      tasks: Object.keys(tasks).filter((key) => !key.includes('#')),
      workspaces,
      pipeline,
    });
    const worker = new TaskWorker({
      rootDir: root,
      graph,
      workspaces,
      hasher: new FileHasher(root),
      cache: new OutputCache(backend),
      runner,
      globalHash: 'global',
      env: { PATH: '/usr/bin', API_URL: 'https://api.example.test' },
      output: sink,
    });
    return { graph, worker, workspaces };
  }

  function node(graph: TaskGraph, id: string): TaskNode {
    const found = graph.get(id);
    if (!found) throw new Error(`missing ${id}`);
    return found;
  }

  beforeEach(async () => {
    root = await createTempDir();
    backend = new InMemoryCacheBackend();
    sink = collectingSink();
    runner = new FakeRunner().on('build-ui', async (request) => {
      await writeFiles(request.cwd, { 'dist/out.js': 'compiled ui\n' });
      request.onOutput?.('ui built\n');
      return commandResult({ output: 'ui built\n' });
    });

    await writeMonorepo(root, {
      packages: {
        'packages/ui': { name: 'ui', scripts: { build: 'build-ui', lint: 'lint-ui' } },
        'packages/web': { name: 'web', scripts: { build: 'build-web' }, dependencies: { ui: '*' } },
      },
      files: {
        'packages/ui/src/index.ts': 'export const ui = 1;\n',
        'packages/web/src/index.ts': 'export const web = 1;\n',
      },
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should run on a miss and replay from the cache afterwards', async () => {
    const { graph, worker } = await setup({ build: { dependsOn: ['^build'], outputs: ['dist/**'] } });
    const ui = node(graph, 'ui#build');
    const fingerprint = await worker.fingerprint(ui);

    const first = await worker.execute(ui, signal);
    const second = await worker.execute(ui, signal);

    expect(first).toMatchObject({ status: 'succeeded', fingerprint, logs: 'ui built\n' });
    expect(second).toMatchObject({ status: 'cached', fingerprint, logs: 'ui built\n' });
    expect(runner.commands()).toEqual(['build-ui']);
    expect(sink.writes).toEqual([
      ['ui#build', `cache miss, executing ${fingerprint}\n`],
      ['ui#build', 'ui built\n'],
      ['ui#build', `cache hit, replaying logs ${fingerprint}\n`],
      ['ui#build', 'ui built\n'],
    ]);
  });

  it('should restore outputs on a hit', async () => {
    const { graph, worker } = await setup({ build: { outputs: ['dist/**'] } });
    const ui = node(graph, 'ui#build');

    await worker.execute(ui, signal);
    await rm(join(root, 'packages/ui/dist'), { recursive: true });
    const replay = await worker.execute(ui, signal);

    expect(replay.status).toBe('cached');
    expect(await readFile(join(root, 'packages/ui/dist/out.js'), 'utf-8')).toBe('compiled ui\n');
  });

  it('should keep the fingerprint stable once outputs exist', async () => {
    const tasks = { build: { outputs: ['dist/**'] } };
    const { graph, worker } = await setup(tasks);
    const before = await worker.fingerprint(node(graph, 'ui#build'));
    await worker.execute(node(graph, 'ui#build'), signal);

    const fresh = await setup(tasks);

    expect(await fresh.worker.fingerprint(node(fresh.graph, 'ui#build'))).toBe(before);
  });

  it('should invalidate dependents when an upstream input changes', async () => {
    const tasks = { build: { dependsOn: ['^build'] } };
    const initial = await setup(tasks);
    const uiBefore = await initial.worker.fingerprint(node(initial.graph, 'ui#build'));
    const webBefore = await initial.worker.fingerprint(node(initial.graph, 'web#build'));

    await writeFiles(root, { 'packages/ui/src/index.ts': 'export const ui = 2;\n' });
    const changed = await setup(tasks);

    expect(await changed.worker.fingerprint(node(changed.graph, 'ui#build'))).not.toBe(uiBefore);
    expect(await changed.worker.fingerprint(node(changed.graph, 'web#build'))).not.toBe(webBefore);
  });

  it('should not invalidate upstream tasks when a dependent changes', async () => {
    const tasks = { build: { dependsOn: ['^build'] } };
    const initial = await setup(tasks);
    const uiBefore = await initial.worker.fingerprint(node(initial.graph, 'ui#build'));

    await writeFiles(root, { 'packages/web/src/index.ts': 'export const web = 2;\n' });
    const changed = await setup(tasks);

    expect(await changed.worker.fingerprint(node(changed.graph, 'ui#build'))).toBe(uiBefore);
  });

  it('should fold declared env into the fingerprint', async () => {
    const withEnv = await setup({ build: { env: ['API_URL'] } });
    const plain = await setup({ build: {} });

    expect(await withEnv.worker.fingerprint(node(withEnv.graph, 'ui#build'))).not.toBe(
      await plain.worker.fingerprint(node(plain.graph, 'ui#build'))
    );
  });

  it('should succeed without running when the workspace has no script', async () => {
    const { graph, worker } = await setup({ test: {} });

    const outcome = await worker.execute(node(graph, 'ui#test'), signal);

    expect(outcome.status).toBe('succeeded');
    expect(runner.requests).toHaveLength(0);
  });

  it('should always run tasks with caching disabled', async () => {
    const { graph, worker } = await setup({ lint: { cache: false } });
    const lint = node(graph, 'ui#lint');

    await worker.execute(lint, signal);
    await worker.execute(lint, signal);

    expect(runner.commands()).toEqual(['lint-ui', 'lint-ui']);
    expect(backend.size()).toBe(0);
  });

  it('should report failures without caching them', async () => {
    runner.on('lint-ui', () =>
      commandResult({
        success: false,
        exitCode: 2,
        output: 'lint error\n',
        error: 'Command exited with code 2',
      })
    );
    const { graph, worker } = await setup({ lint: { outputLogs: 'errors-only' } });

    const outcome = await worker.execute(node(graph, 'ui#lint'), signal);

    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBe(2);
    expect(outcome.error).toBeInstanceOf(TaskExecutionError);
    expect(outcome.error?.message).toBe('ui#lint: Command exited with code 2');
    expect(sink.writes).toEqual([['ui#lint', 'lint error\n']]);
    expect(backend.size()).toBe(0);
  });

  it('should report cancelled commands', async () => {
    runner.on('lint-ui', () => commandResult({ success: false, cancelled: true, exitCode: null }));
    const { graph, worker } = await setup({ lint: {} });

    const outcome = await worker.execute(node(graph, 'ui#lint'), signal);

    expect(outcome.status).toBe('cancelled');
  });

  it('should only print the hash under hash-only', async () => {
    const { graph, worker } = await setup({ lint: { outputLogs: 'hash-only' } });
    const lint = node(graph, 'ui#lint');
    const fingerprint = await worker.fingerprint(lint);

    await worker.execute(lint, signal);

    expect(sink.writes).toEqual([['ui#lint', `cache miss, executing ${fingerprint}\n`]]);
    expect(runner.requests[0]?.onOutput).toBeUndefined();
  });

  it('should give tasks their fingerprint and local binaries', async () => {
    const { graph, worker } = await setup({ lint: {} });
    const lint = node(graph, 'ui#lint');
    const fingerprint = await worker.fingerprint(lint);

    await worker.execute(lint, signal);

    const request = runner.requests[0];
    expect(request?.cwd).toBe(join(root, 'packages/ui'));
    expect(request?.env.HOPPER_HASH).toBe(fingerprint);
    expect(request?.env.API_URL).toBe('https://api.example.test');
    expect(request?.env.PATH?.split(delimiter)).toEqual([
      join(root, 'packages/ui', 'node_modules', '.bin'),
      join(root, 'node_modules', '.bin'),
      '/usr/bin',
    ]);
  });

  it('should run instead when cached outputs cannot be restored', async () => {
    const { graph, worker } = await setup({ lint: { outputs: ['report/**'] } });
    const lint = node(graph, 'ui#lint');
    const fingerprint = await worker.fingerprint(lint);
    await backend.put(fingerprint, {
      fingerprint,
      taskId: 'ui#lint',
      files: [{ type: 'file', path: '../../escape', content: '', mode: 0o644 }],
      logs: '',
      duration: 1,
      createdAt: 1,
    });

    const outcome = await worker.execute(lint, signal);

    expect(outcome.status).toBe('succeeded');
    expect(runner.commands()).toEqual(['lint-ui']);
  });
});
