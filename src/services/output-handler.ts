/**
 * Output handler
 * Collects run results and writes the result files of one benchmark
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  categoryOf,
  describeError,
  type Benchmark,
  type Run,
  type RunResult,
  type RunSet,
  type RunStatus,
  type SystemInfo,
  type VerdictCategory,
} from '../models/index.js';

export interface OutputHandler {
  /** Every path written for this benchmark so far */
  readonly allCreatedFiles: ReadonlySet<string>;
  /** Free-text summary of the benchmark, used for commit messages */
  readonly description: string;
  outputBeforeRunSet(runSet: RunSet): Promise<void>;
  outputAfterRun(runSet: RunSet, run: Run, result: RunResult): Promise<void>;
  outputAfterRunSet(runSet: RunSet): Promise<void>;
  outputAfterBenchmark(isStopped: boolean): Promise<void>;
}

export type OutputHandlerFactory = (benchmark: Benchmark, systemInfo: SystemInfo) => OutputHandler;

interface FinishedRun {
  run: Run;
  result: RunResult;
}

function formatLimit(value: number | undefined, unit: string): string {
  return value === undefined ? '-' : `${value} ${unit}`;
}

function formatDate(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function describeBenchmark(benchmark: Benchmark, systemInfo: SystemInfo): string {
  const version = benchmark.toolVersion ? ` ${benchmark.toolVersion}` : '';
  const lines = [
    `benchmark:    ${benchmark.name}`,
    `tool:         ${benchmark.toolName}${version}`,
    `date:         ${formatDate(benchmark.startTime)}`,
    `time limit:   ${formatLimit(benchmark.rlimits.timelimit, 's')}`,
    `memory limit: ${formatLimit(benchmark.rlimits.memlimit, 'MB')}`,
    `core limit:   ${formatLimit(benchmark.rlimits.corelimit, 'cores')}`,
    `host:         ${systemInfo.hostname} (${systemInfo.os})`,
    `cpu:          ${systemInfo.cpuModel}, ${systemInfo.cpuCores} cores`,
    `memory:       ${Math.round(systemInfo.memoryBytes / (1024 * 1024))} MB`,
  ];
  return lines.join('\n');
}

export function countCategories(statuses: readonly RunStatus[]): Record<VerdictCategory, number> {
  const counts: Record<VerdictCategory, number> = { true: 0, false: 0, unknown: 0, error: 0 };
  for (const status of statuses) {
    counts[categoryOf(status)] += 1;
  }
  return counts;
}

export class ResultsOutputHandler implements OutputHandler {
  readonly description: string;
  private readonly createdFiles = new Set<string>();
  private readonly finished = new Map<string, FinishedRun[]>();

  constructor(
    private readonly benchmark: Benchmark,
    private readonly systemInfo: SystemInfo
  ) {
    this.description = describeBenchmark(benchmark, systemInfo);
  }

  get allCreatedFiles(): ReadonlySet<string> {
    return this.createdFiles;
  }

  resultsFile(runSet: RunSet): string {
    return `${this.benchmark.outputBase}.results.${runSet.name}.txt`;
  }

  summaryFile(): string {
    return `${this.benchmark.outputBase}.results.json`;
  }

  async outputBeforeRunSet(runSet: RunSet): Promise<void> {
    this.finished.set(runSet.name, []);
  }

  async outputAfterRun(runSet: RunSet, run: Run, result: RunResult): Promise<void> {
    const entries = this.finished.get(runSet.name) ?? [];
    entries.push({ run, result });
    this.finished.set(runSet.name, entries);
    this.createdFiles.add(run.logFile);
  }

  async outputAfterRunSet(runSet: RunSet): Promise<void> {
    const entries = this.ordered(runSet);
    const width = Math.max(10, ...entries.map(({ run }) => run.identifier.length));
    const counts = countCategories(entries.map(({ result }) => result.status));

    const lines = [
      this.description,
      '',
      `run set: ${runSet.name}`,
      `${'identifier'.padEnd(width)}  ${'status'.padEnd(24)}  walltime (s)`,
      ...entries.map(
        ({ run, result }) =>
          `${run.identifier.padEnd(width)}  ${result.status.padEnd(24)}  ${result.wallTimeSeconds.toFixed(2)}`
      ),
      '',
      `statistics: true ${counts.true}, false ${counts.false}, unknown ${counts.unknown}, error ${counts.error}`,
      '',
    ];
    await this.write(this.resultsFile(runSet), lines.join('\n'));
  }

  async outputAfterBenchmark(isStopped: boolean): Promise<void> {
    const summary = {
      benchmark: this.benchmark.name,
      definitionFile: this.benchmark.definitionFile,
      tool: this.benchmark.toolName,
      toolVersion: this.benchmark.toolVersion,
      startTime: this.benchmark.startTime.toISOString(),
      limits: this.benchmark.rlimits,
      system: this.systemInfo,
      complete: !isStopped,
      runSets: this.benchmark.runSets
        .filter((runSet) => this.finished.has(runSet.name))
        .map((runSet) => ({
          name: runSet.name,
          runs: this.ordered(runSet).map(({ run, result }) => ({
            identifier: run.identifier,
            task: run.task ?? null,
            status: result.status,
            category: categoryOf(result.status),
            returnCode: result.returnCode,
            signal: result.signal ?? null,
            wallTimeSeconds: result.wallTimeSeconds,
            isTimeout: result.isTimeout,
            logFile: run.logFile,
          })),
        })),
    };
    await this.write(this.summaryFile(), `${JSON.stringify(summary, null, 2)}\n`);
  }

  // Runs of one set finish in any order when executed in parallel
  private ordered(runSet: RunSet): FinishedRun[] {
    const entries = this.finished.get(runSet.name) ?? [];
    return [...entries].sort((a, b) => runSet.runs.indexOf(a.run) - runSet.runs.indexOf(b.run));
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to write result file ${path}: ${describeError(error)}`);
    }
    this.createdFiles.add(path);
  }
}

export const createResultsOutputHandler: OutputHandlerFactory = (benchmark, systemInfo) =>
  new ResultsOutputHandler(benchmark, systemInfo);
