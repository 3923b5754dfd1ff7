/**
 * Task Graph System - Task ids, the task DAG and its resolver
 */

export {
  formatTaskId,
  parseTaskId,
  parseDependencyRef,
  isRootTaskId,
  type DependencyRef,
} from './task-id.js';

export { TaskGraph, CycleError, compareNodes } from './task-graph.js';

export { TaskGraphResolver, ResolveError, type ResolveOptions } from './resolver.js';
