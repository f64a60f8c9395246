/**
 * Benchmark orchestrator
 * Drives the executor over every benchmark definition given on the command
 * line, one file after the other.
 */

import { existsSync } from 'node:fs';
import { rmdir } from 'node:fs/promises';
import type { OutputConfiguration } from 'commander';
import type { Logger } from 'pino';
import { parseArguments, outputDirectory, type Config } from '../config/index.js';
import type { Executor } from '../executors/base.js';
import { LocalExecutor } from '../executors/local.js';
import { createBenchmarkLoader, type BenchmarkLoader } from './benchmark-loader.js';
import { createResultsOutputHandler, type OutputHandlerFactory } from '../services/output-handler.js';
import { addFilesToGitRepository, type GitPersistence } from '../services/git.js';
import { ExistingResultsError, describeError, type Benchmark } from '../models/index.js';
import { setupLogging } from '../utils/logger.js';

export interface OrchestratorDependencies {
  /** Replaces the local executor, e.g. with one that delegates to a cluster */
  createExecutor?: (logger: Logger) => Executor;
  loadBenchmark?: (logger: Logger) => BenchmarkLoader;
  createOutputHandler?: OutputHandlerFactory;
  addFilesToGitRepository?: GitPersistence;
  /** Skips the process-wide logging setup */
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  parserOutput?: OutputConfiguration;
  now?: () => Date;
}

export class BenchmarkOrchestrator {
  private executor: Executor | null = null;
  private logger: Logger | null = null;
  private stoppedByInterrupt = false;

  constructor(private readonly deps: OrchestratorDependencies = {}) {}

  get isStopped(): boolean {
    return this.stoppedByInterrupt;
  }

  /** Logger of the current execution, null until the command line is parsed */
  get activeLogger(): Logger | null {
    return this.logger;
  }

  /**
   * Execute all benchmark files named in the arguments (without the program
   * name) and return the combined return code.
   */
  async start(argv: readonly string[]): Promise<number> {
    const parseOptions = {
      ...(this.deps.env ? { env: this.deps.env } : {}),
      ...(this.deps.parserOutput ? { output: this.deps.parserOutput } : {}),
    };
    const config = parseArguments(argv, parseOptions);

    const logger = this.deps.logger ?? setupLogging(config.logging);
    this.logger = logger;

    const executor = this.loadExecutor(logger);
    this.executor = executor;
    const loadBenchmark = this.deps.loadBenchmark?.(logger) ?? createBenchmarkLoader({ logger });

    let returnCode = 0;
    for (const file of config.files) {
      if (this.stoppedByInterrupt) {
        break;
      }
      logger.debug({ file }, 'Benchmark is started');
      const code = await this.executeBenchmark(file, config, executor, loadBenchmark, logger);
      returnCode = returnCode || code;
      logger.debug({ file, returnCode: code }, 'Benchmark is done');
    }

    logger.debug('All benchmarks are done');
    return returnCode;
  }

  /**
   * Not guaranteed to terminate running tools before it returns. No new
   * benchmark file is started afterwards.
   */
  stop(): void {
    this.stoppedByInterrupt = true;
    this.executor?.stop();
  }

  protected loadExecutor(logger: Logger): Executor {
    return this.deps.createExecutor?.(logger) ?? new LocalExecutor(logger);
  }

  private async executeBenchmark(
    file: string,
    config: Config,
    executor: Executor,
    loadBenchmark: BenchmarkLoader,
    logger: Logger
  ): Promise<number> {
    const startTime = config.startTime ?? this.deps.now?.() ?? new Date();
    const benchmark = await loadBenchmark(file, config, startTime);
    this.checkExistingResults(benchmark);

    executor.init(config, benchmark);
    const createOutputHandler = this.deps.createOutputHandler ?? createResultsOutputHandler;
    const outputHandler = createOutputHandler(benchmark, executor.getSystemInfo());

    logger.debug(
      { file, runSets: benchmark.runSets.length, tool: benchmark.toolName, version: benchmark.toolVersion },
      'Benchmarking'
    );

    let result: number;
    try {
      result = await executor.executeBenchmark(benchmark, outputHandler);
    } finally {
      await this.removeEmptyLogFolder(benchmark.logFolder, logger);
    }

    if (config.commit && !this.stoppedByInterrupt) {
      const persist = this.deps.addFilesToGitRepository ?? addFilesToGitRepository;
      try {
        await persist(
          outputDirectory(config),
          outputHandler.allCreatedFiles,
          `${config.commitMessage}\n\n${outputHandler.description}`
        );
      } catch (error) {
        logger.warn({ error: describeError(error) }, 'Could not add files to git repository');
      }
    }
    return result;
  }

  // Refuse to overwrite results of an earlier execution
  private checkExistingResults(benchmark: Benchmark): void {
    if (existsSync(benchmark.logFolder)) {
      throw new ExistingResultsError(benchmark.logFolder);
    }
  }

  private async removeEmptyLogFolder(folder: string, logger: Logger): Promise<void> {
    try {
      await rmdir(folder);
    } catch (error) {
      logger.debug({ folder, error: describeError(error) }, 'Log folder not removed');
    }
  }
}
