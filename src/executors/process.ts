/**
 * Spawns one tool invocation
 */

import { constants } from 'node:os';
import { execa } from 'execa';
import { Result, Ok, Err } from '../models/index.js';

export interface ProcessOptions {
  timeoutMs?: number;
  cancelSignal?: AbortSignal;
  cwd?: string;
}

export interface ProcessOutcome {
  returnCode: number;
  signal?: number;
  isTimeout: boolean;
  output: string;
  wallTimeSeconds: number;
}

export type ProcessRunner = (cmdline: readonly string[], options: ProcessOptions) => Promise<Result<ProcessOutcome, string>>;

/**
 * Run a command with combined stdout/stderr. A process killed by a signal
 * reports 128 + signal number as its return code, like a shell does.
 * Err only when the process could not be started at all.
 */
export const runProcess: ProcessRunner = async (cmdline, options) => {
  const [file, ...args] = cmdline;
  if (file === undefined) {
    return Err('Empty command line');
  }

  const result = await execa(file, args, {
    reject: false,
    all: true,
    stdin: 'ignore',
    timeout: options.timeoutMs,
    cancelSignal: options.cancelSignal,
    cwd: options.cwd,
  });

  const signal = result.signal === undefined ? undefined : constants.signals[result.signal];
  if (result.exitCode === undefined && signal === undefined && !result.timedOut && !result.isCanceled) {
    return Err(result.shortMessage ?? `Could not start ${file}`);
  }

  const outcome: ProcessOutcome = {
    returnCode: result.exitCode ?? (signal === undefined ? 0 : 128 + signal),
    isTimeout: result.timedOut,
    output: result.all ?? '',
    wallTimeSeconds: result.durationMs / 1000,
  };
  if (signal !== undefined) {
    outcome.signal = signal;
  }
  return Ok(outcome);
};
