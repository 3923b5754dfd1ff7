#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './program.js';

const controller = new AbortController();
let interrupted = false;

const interrupt = (signal: NodeJS.Signals) => {
  if (interrupted) {
    process.exit(130);
  }
  interrupted = true;
  process.stderr.write(`\nReceived ${signal}, stopping tasks...\n`);
  controller.abort();
};

process.on('SIGINT', () => interrupt('SIGINT'));
process.on('SIGTERM', () => interrupt('SIGTERM'));

createProgram({ signal: controller.signal })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
