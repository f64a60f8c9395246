/**
 * Tool adapter contract
 * Every supported analysis tool is wrapped by one adapter
 */

import { dirname, join } from 'node:path';
import { execa } from 'execa';
import which from 'which';
import type { ResourceLimits } from '../models/benchmark.js';
import type { RunStatus } from '../models/verdicts.js';
import { ToolNotFoundError, UnsupportedTasksError } from '../models/errors.js';

export interface ToolAdapter {
  /** Locates the binary to run; throws ToolNotFoundError when it is not on the search path. */
  executable(): string;
  name(): string;
  /** Best-effort version string, empty when the tool has no reliable way to report one. */
  version(executable: string): Promise<string>;
  cmdline(
    executable: string,
    options: readonly string[],
    tasks: readonly string[],
    propertyFile: string | undefined,
    rlimits: ResourceLimits
  ): string[];
  /**
   * Maps the evidence of one finished run to a status. Must not throw and
   * must return the same status for the same arguments.
   */
  determineResult(
    returnCode: number,
    returnSignal: number | undefined,
    output: readonly string[],
    isTimeout: boolean
  ): RunStatus;
  /** Files and directories that have to travel with the executable. */
  programFiles(executable: string): string[];
}

export function findExecutable(program: string): string {
  const found = which.sync(program, { nothrow: true });
  if (found === null) {
    throw new ToolNotFoundError(program);
  }
  return found;
}

export async function versionFromTool(executable: string, arg = '--version'): Promise<string> {
  const result = await execa(executable, [arg], {
    reject: false,
    stdin: 'ignore',
    timeout: 10_000,
  });
  if (result.failed) {
    return '';
  }
  const firstLine = result.stdout.split('\n').find((line) => line.trim().length > 0);
  return firstLine?.trim() ?? '';
}

export abstract class BaseTool implements ToolAdapter {
  /** Paths relative to the executable's folder that the tool needs at run time */
  protected readonly requiredPaths: readonly string[] = [];
  protected readonly maxTasks: number = 1;

  abstract executable(): string;
  abstract name(): string;
  abstract determineResult(
    returnCode: number,
    returnSignal: number | undefined,
    output: readonly string[],
    isTimeout: boolean
  ): RunStatus;

  async version(_executable: string): Promise<string> {
    return '';
  }

  cmdline(
    executable: string,
    options: readonly string[],
    tasks: readonly string[],
    _propertyFile: string | undefined,
    _rlimits: ResourceLimits
  ): string[] {
    this.checkTaskCount(tasks);
    return [executable, ...options, ...tasks];
  }

  programFiles(executable: string): string[] {
    const folder = dirname(executable);
    const files = [executable, ...this.requiredPaths.map((path) => join(folder, path))];
    return [...new Set(files)];
  }

  protected checkTaskCount(tasks: readonly string[]): void {
    if (tasks.length > this.maxTasks) {
      throw new UnsupportedTasksError(this.name(), tasks.length, this.maxTasks);
    }
  }

  protected singleTask(tasks: readonly string[]): string {
    const [task] = tasks;
    if (task === undefined || tasks.length !== 1) {
      throw new UnsupportedTasksError(this.name(), tasks.length, 1);
    }
    return task;
  }
}
