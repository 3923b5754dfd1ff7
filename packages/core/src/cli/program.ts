import { Command } from 'commander';
import { resolve } from 'path';
import { Hopper } from '../hopper.js';
import { ConfigError, loadConfigFromEnv } from '../config.js';
import { selectWorkspaces } from '../workspace/filter.js';
import { createDefaultLogger, createPrefixedSink, isLogLevel, type TextStream } from '../logger.js';
import type { HopperConfig, KillPolicy, LogLevel } from '../types.js';
import { formatDryRun, formatSummary } from './format.js';

const KILL_POLICIES: KillPolicy[] = ['graceful', 'immediate', 'wait'];

export interface CliContext {
  stdout: TextStream;
  stderr: TextStream;
  env: Record<string, string | undefined>;
  cwd: string;
  /** Aborted on SIGINT / SIGTERM */
  signal?: AbortSignal;
  setExitCode: (code: number) => void;
}

interface RunFlags {
  filter: string[];
  concurrency?: string;
  dryRun?: string | boolean;
  force?: boolean;
  cache: boolean;
  cacheDir?: string;
  killPolicy?: string;
  logLevel?: string;
  cwd?: string;
}

interface LsFlags {
  filter: string[];
  cwd?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseKillPolicy(value: string | undefined): KillPolicy | undefined {
  if (value === undefined) return undefined;
  const policy = KILL_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new ConfigError(`Invalid kill policy '${value}': expected ${KILL_POLICIES.join(', ')}`);
  }
  return policy;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  if (!isLogLevel(value)) {
    throw new ConfigError(`Invalid log level '${value}'`);
  }
  return value;
}

function defaultContext(): CliContext {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

/**
 * Build the `hopper` command line
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(overrides: Partial<CliContext> = {}): Command {
  const ctx: CliContext = { ...defaultContext(), ...overrides };

  const fail = (error: unknown) => {
    ctx.stderr.write(`hopper: ${error instanceof Error ? error.message : String(error)}\n`);
    ctx.setExitCode(1);
  };

  const baseConfig = (cwd: string | undefined, logLevel: string | undefined): HopperConfig => {
    const fromEnv = loadConfigFromEnv(ctx.env);
    return {
      ...fromEnv,
      rootDir: resolve(ctx.cwd, cwd ?? '.'),
      env: ctx.env,
      logLevel: parseLogLevel(logLevel, fromEnv.logLevel ?? 'warn'),
    };
  };

  const program = new Command('hopper');
  program.description('Run tasks across the workspaces of a monorepo').showHelpAfterError();

  program
    .command('run')
    .description('Run tasks and their dependencies')
    .argument('<tasks...>', 'Tasks to run, e.g. build or web#test')
    .option('-F, --filter <pattern>', 'Restrict to matching workspaces (repeatable)', collect, [])
    .option('--concurrency <n>', "Max tasks at once: a count or a CPU share such as '50%'")
    .option('--dry-run [format]', 'Print the plan without running it (text or json)')
    .option('--force', 'Ignore existing cache entries')
    .option('--no-cache', 'Do not write cache entries')
    .option('--cache-dir <dir>', 'Local cache directory')
    .option('--kill-policy <policy>', 'How running tasks are stopped on interrupt')
    .option('--log-level <level>', 'error, warn, info or debug')
    .option('--cwd <dir>', 'Repository root')
    .action(async (tasks: string[], flags: RunFlags) => {
      try {
        const config = baseConfig(flags.cwd, flags.logLevel);
        const fromEnv = config.cache;

        const hopper = new Hopper({
          ...config,
          concurrency: flags.concurrency ?? config.concurrency,
          killPolicy: parseKillPolicy(flags.killPolicy),
          logger: createDefaultLogger(config.logLevel),
          output: createPrefixedSink(ctx.stdout),
          cache: {
            type: 'local',
            dir: flags.cacheDir ?? fromEnv?.dir,
            read: !(flags.force || fromEnv?.read === false),
            write: flags.cache,
          },
        });

        try {
          if (flags.dryRun) {
            const report = await hopper.dryRun(tasks, { filter: flags.filter });
            ctx.stdout.write(
              flags.dryRun === 'json' ? `${JSON.stringify(report, null, 2)}\n` : formatDryRun(report)
            );
            return;
          }

          const summary = await hopper.run(tasks, { filter: flags.filter, signal: ctx.signal });
          ctx.stdout.write(`\n${formatSummary(summary)}`);
          if (!summary.success) {
            ctx.setExitCode(summary.cancelled ? 130 : 1);
          }
        } finally {
          await hopper.close();
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('ls')
    .description('List workspaces')
    .option('-F, --filter <pattern>', 'Restrict to matching workspaces (repeatable)', collect, [])
    .option('--cwd <dir>', 'Repository root')
    .action(async (flags: LsFlags) => {
      try {
        const hopper = new Hopper(baseConfig(flags.cwd, undefined));
        try {
          const workspaces = await hopper.discover();
          const selected = selectWorkspaces(workspaces, flags.filter);
          for (const name of selected) {
            ctx.stdout.write(`${name} ${workspaces.get(name)?.path ?? ''}\n`);
          }
        } finally {
          await hopper.close();
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
