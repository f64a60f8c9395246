/**
 * In-memory benchmark model
 * Built once per definition file and read-only afterwards
 */

import type { ToolAdapter } from '../tools/base.js';
import type { RunStatus } from './verdicts.js';

export interface ResourceLimits {
  /** CPU/wall time per run, in seconds */
  readonly timelimit?: number;
  /** Memory per run, in MB */
  readonly memlimit?: number;
  readonly corelimit?: number;
}

export interface Run {
  readonly identifier: string;
  /** Name of the run definition this run was created from */
  readonly runDefinition: string;
  readonly task?: string;
  readonly propertyFile?: string;
  readonly options: readonly string[];
  readonly logFile: string;
}

export interface RunSet {
  readonly name: string;
  readonly index: number;
  readonly options: readonly string[];
  readonly runs: readonly Run[];
  readonly shouldBeExecuted: boolean;
}

export interface Benchmark {
  readonly name: string;
  readonly definitionFile: string;
  readonly startTime: Date;
  readonly tool: ToolAdapter;
  readonly toolName: string;
  readonly toolVersion: string;
  readonly executable: string;
  readonly rlimits: ResourceLimits;
  readonly outputBase: string;
  readonly logFolder: string;
  readonly runSets: readonly RunSet[];
}

export interface RunResult {
  readonly returnCode: number;
  readonly signal?: number;
  readonly wallTimeSeconds: number;
  readonly isTimeout: boolean;
  readonly output: readonly string[];
  readonly status: RunStatus;
}

export interface SystemInfo {
  readonly hostname: string;
  readonly os: string;
  readonly cpuModel: string;
  readonly cpuCores: number;
  readonly memoryBytes: number;
}
