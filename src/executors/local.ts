/**
 * Local executor
 * Executes all runs of a benchmark on this machine with a bounded number of
 * parallel workers. Wall-clock time limits are enforced, other limits are
 * only handed to the tool adapter.
 */

import { cpus, hostname, release, totalmem, type as osType } from 'node:os';
import { mkdir } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { Executor } from './base.js';
import { runProcess, type ProcessRunner } from './process.js';
import type { Config } from '../config/index.js';
import type { OutputHandler } from '../services/output-handler.js';
import {
  describeError,
  errorStatus,
  type Benchmark,
  type Run,
  type RunResult,
  type RunSet,
  type RunStatus,
  type SystemInfo,
} from '../models/index.js';
import { writeRunLog } from '../utils/logfile.js';

export interface LocalExecutorOptions {
  runProcess?: ProcessRunner;
}

interface RunOutcome {
  result: RunResult;
  started: boolean;
}

function splitLines(output: string): string[] {
  if (output.length === 0) {
    return [];
  }
  const lines = output.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class LocalExecutor implements Executor {
  readonly name = 'local';
  private stopped = false;
  private readonly aborter = new AbortController();
  private readonly runProcess: ProcessRunner;
  private threads = 1;
  private maxLogfileSize = 20;

  constructor(
    private readonly logger: Logger,
    options: LocalExecutorOptions = {}
  ) {
    this.runProcess = options.runProcess ?? runProcess;
  }

  init(config: Config, benchmark: Benchmark): void {
    this.threads = config.numOfThreads ?? 1;
    this.maxLogfileSize = config.maxLogfileSize;
    if (benchmark.rlimits.memlimit !== undefined || benchmark.rlimits.corelimit !== undefined) {
      this.logger.warn(
        { memlimit: benchmark.rlimits.memlimit, corelimit: benchmark.rlimits.corelimit },
        'Memory and core limits are not enforced by the local executor'
      );
    }
  }

  getSystemInfo(): SystemInfo {
    const processors = cpus();
    return {
      hostname: hostname(),
      os: `${osType()} ${release()}`,
      cpuModel: processors[0]?.model.trim() ?? 'unknown',
      cpuCores: processors.length,
      memoryBytes: totalmem(),
    };
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.aborter.abort();
    this.logger.info('Stopping local execution, waiting for running tools to terminate');
  }

  async executeBenchmark(benchmark: Benchmark, outputHandler: OutputHandler): Promise<number> {
    await mkdir(benchmark.logFolder, { recursive: true });

    let returnCode = 0;
    for (const runSet of benchmark.runSets) {
      if (this.stopped) {
        break;
      }
      if (!runSet.shouldBeExecuted) {
        this.logger.info({ runSet: runSet.name }, 'Skipping run set');
        continue;
      }

      this.logger.info(
        { runSet: runSet.name, runs: runSet.runs.length, threads: this.threads },
        'Executing run set'
      );
      await outputHandler.outputBeforeRunSet(runSet);
      const code = await this.executeRunSet(benchmark, runSet, outputHandler);
      returnCode = returnCode || code;
      await outputHandler.outputAfterRunSet(runSet);
    }

    await outputHandler.outputAfterBenchmark(this.stopped);
    return returnCode;
  }

  private async executeRunSet(benchmark: Benchmark, runSet: RunSet, outputHandler: OutputHandler): Promise<number> {
    const queue = [...runSet.runs];
    let returnCode = 0;
    // Set by the first worker that fails so the others take no further runs
    let failed = false;

    const worker = async (): Promise<void> => {
      for (let run = queue.shift(); run !== undefined && !this.stopped && !failed; run = queue.shift()) {
        try {
          const outcome = await this.executeRun(benchmark, run);
          if (!outcome.started) {
            returnCode = 1;
          }
          await outputHandler.outputAfterRun(runSet, run, outcome.result);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.threads, queue.length));
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }
    return returnCode;
  }

  private async executeRun(benchmark: Benchmark, run: Run): Promise<RunOutcome> {
    let cmdline: string[];
    try {
      cmdline = benchmark.tool.cmdline(
        benchmark.executable,
        run.options,
        run.task === undefined ? [] : [run.task],
        run.propertyFile,
        benchmark.rlimits
      );
    } catch (error) {
      const message = describeError(error);
      this.logger.error({ run: run.identifier, error: message }, 'Cannot build command line');
      await this.writeLog(run, [benchmark.executable], message);
      return { result: this.failedRun(errorStatus(message)), started: false };
    }

    this.logger.debug({ run: run.identifier, cmdline }, 'Starting run');
    const timeoutMs = benchmark.rlimits.timelimit === undefined ? undefined : benchmark.rlimits.timelimit * 1000;
    const processed = await this.runProcess(cmdline, { timeoutMs, cancelSignal: this.aborter.signal });

    if (!processed.ok) {
      this.logger.error({ run: run.identifier, error: processed.error }, 'Cannot execute tool');
      await this.writeLog(run, cmdline, processed.error);
      return { result: this.failedRun(errorStatus(processed.error)), started: false };
    }

    const outcome = processed.value;
    const output = splitLines(outcome.output);
    await this.writeLog(run, cmdline, outcome.output);

    const status = this.classify(benchmark, run, outcome.returnCode, outcome.signal, output, outcome.isTimeout);
    this.logger.info({ run: run.identifier, status, walltime: outcome.wallTimeSeconds }, 'Run finished');

    const result: RunResult = {
      returnCode: outcome.returnCode,
      wallTimeSeconds: outcome.wallTimeSeconds,
      isTimeout: outcome.isTimeout,
      output,
      status,
      ...(outcome.signal === undefined ? {} : { signal: outcome.signal }),
    };
    return { result, started: true };
  }

  // A log that cannot be written costs the run its log file, not its result
  private async writeLog(run: Run, cmdline: readonly string[], output: string): Promise<void> {
    try {
      await writeRunLog(run.logFile, cmdline, output, this.maxLogfileSize);
    } catch (error) {
      this.logger.warn({ run: run.identifier, logFile: run.logFile, error: describeError(error) }, 'Cannot write run log');
    }
  }

  // A misbehaving adapter costs one run its verdict, never the benchmark
  private classify(
    benchmark: Benchmark,
    run: Run,
    returnCode: number,
    signal: number | undefined,
    output: readonly string[],
    isTimeout: boolean
  ): RunStatus {
    try {
      return benchmark.tool.determineResult(returnCode, signal, output, isTimeout);
    } catch (error) {
      this.logger.warn({ run: run.identifier, error: describeError(error) }, 'Tool adapter failed to classify output');
      return errorStatus(`classification failed: ${describeError(error)}`);
    }
  }

  private failedRun(status: RunStatus): RunResult {
    return { returnCode: -1, wallTimeSeconds: 0, isTimeout: false, output: [], status };
  }
}
