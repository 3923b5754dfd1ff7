export {
  CommandRunner,
  type CommandRunnerConfig,
  type CommandResult,
  type RunRequest,
  type TaskRunner,
} from './command-runner.js';
