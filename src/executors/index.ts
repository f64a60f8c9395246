/**
 * Executor exports
 */

export type { Executor } from './base.js';
export { LocalExecutor, type LocalExecutorOptions } from './local.js';
export { runProcess, type ProcessRunner, type ProcessOutcome, type ProcessOptions } from './process.js';
