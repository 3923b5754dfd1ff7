/**
 * Scheduler System - Bounded parallel execution of a task graph
 */

export {
  TaskScheduler,
  type SchedulerEvents,
  type SchedulerConfig,
  type TaskWorkerFn,
  type ScheduleOptions,
  type ScheduleResult,
} from './scheduler.js';

export { TaskWorker, TaskExecutionError, type TaskWorkerConfig } from './task-worker.js';
