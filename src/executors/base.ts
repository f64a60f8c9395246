/**
 * Executor interface
 * An executor runs every run of a benchmark and reports each result to the
 * output handler. The orchestrator only knows this contract.
 */

import type { Config } from '../config/index.js';
import type { Benchmark, SystemInfo } from '../models/index.js';
import type { OutputHandler } from '../services/output-handler.js';

export interface Executor {
  readonly name: string;
  init(config: Config, benchmark: Benchmark): void;
  /** Resolves with 0 when every run could be executed, non-zero otherwise. */
  executeBenchmark(benchmark: Benchmark, outputHandler: OutputHandler): Promise<number>;
  getSystemInfo(): SystemInfo;
  /** Idempotent. No new runs start afterwards; in-flight runs are aborted best-effort. */
  stop(): void;
}
