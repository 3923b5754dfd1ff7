import type { Logger, LogLevel, OutputSink } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Anything text can be written to (process.stdout, a test buffer)
 */
export interface TextStream {
  write(text: string): unknown;
}

/**
 * Create default console logger
 */
export function createDefaultLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[hopper ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[hopper WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[hopper INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[hopper DEBUG] ${msg}`, meta || '');
    },
  };
}

/**
 * Logger that drops everything (tests, embedding)
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Prefix every line of task output with its task id
 */
export function createPrefixedSink(stream: TextStream = process.stdout): OutputSink {
  return {
    write(taskId: string, text: string) {
      const lines = text.split('\n');
      if (lines[lines.length - 1] === '') lines.pop();
      for (const line of lines) {
        stream.write(`${taskId}: ${line}\n`);
      }
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}
