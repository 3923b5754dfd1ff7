export { createProgram, type CliContext } from './program.js';
export { formatSummary, formatDryRun, formatDuration } from './format.js';
