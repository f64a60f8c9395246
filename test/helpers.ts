/**
 * Shared fixtures for tests
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ConfigSchema, type Config, type ConfigInput } from '../src/config/index.js';
import { BaseTool } from '../src/tools/base.js';
import type { Executor } from '../src/executors/base.js';
import type { OutputHandler } from '../src/services/output-handler.js';
import { formatInstance, type BenchmarkLoader } from '../src/core/benchmark-loader.js';
import { Verdicts, failedStatus, type Benchmark, type Run, type RunSet, type RunStatus, type SystemInfo } from '../src/models/index.js';

const LogRecordSchema = z
  .object({
    level: z.number(),
    msg: z.string().optional(),
  })
  .passthrough();

export type LogRecord = z.infer<typeof LogRecordSchema>;

export const LEVEL_WARN = 40;
export const LEVEL_ERROR = 50;

export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(chunk: string): void {
        records.push(LogRecordSchema.parse(JSON.parse(chunk)));
      },
    }
  );
  return { logger, records };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function makeTempDir(prefix = 'benchrunner-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function makeConfig(overrides: Partial<ConfigInput> = {}): Config {
  return ConfigSchema.parse({
    files: ['bench.yml'],
    logging: { level: 'silent', pretty: false },
    ...overrides,
  });
}

/** Adapter that echoes its input file and classifies the literal markers TRUE and FALSE */
export class EchoTool extends BaseTool {
  executable(): string {
    return '/usr/bin/echo-tool';
  }

  name(): string {
    return 'echo-tool';
  }

  determineResult(returnCode: number, returnSignal: number | undefined, output: readonly string[]): RunStatus {
    if (output.includes('TRUE')) {
      return Verdicts.TRUE_PROP;
    }
    if (output.includes('FALSE')) {
      return Verdicts.FALSE_REACH;
    }
    return returnCode === 0 ? Verdicts.UNKNOWN : failedStatus(returnCode, returnSignal);
  }
}

export function makeRun(identifier: string, logFolder: string, overrides: Partial<Run> = {}): Run {
  return {
    identifier,
    runDefinition: 'default',
    task: identifier,
    options: [],
    logFile: join(logFolder, `default.${identifier}.log`),
    ...overrides,
  };
}

export function makeRunSet(runs: Run[], overrides: Partial<RunSet> = {}): RunSet {
  return { name: 'default', index: 1, options: [], runs, shouldBeExecuted: true, ...overrides };
}

export function makeBenchmark(outputBase: string, runSets: RunSet[] = [], overrides: Partial<Benchmark> = {}): Benchmark {
  return {
    name: 'bench',
    definitionFile: 'bench.yml',
    startTime: new Date(2024, 2, 5, 9, 7),
    tool: new EchoTool(),
    toolName: 'echo-tool',
    toolVersion: '1.0',
    executable: '/usr/bin/echo-tool',
    rlimits: {},
    outputBase,
    logFolder: `${outputBase}.logfiles/`,
    runSets,
    ...overrides,
  };
}

export const SYSTEM_INFO: SystemInfo = {
  hostname: 'test-host',
  os: 'Linux 6.0',
  cpuModel: 'Test CPU',
  cpuCores: 4,
  memoryBytes: 8 * 1024 * 1024 * 1024,
};

type ExecuteBehaviour = (benchmark: Benchmark, outputHandler: OutputHandler) => Promise<number>;

/** Executor that records what it was asked to do and delegates execution to the test */
export class FakeExecutor implements Executor {
  readonly name = 'fake';
  readonly executed: string[] = [];
  stopCalls = 0;

  constructor(private readonly behaviour: ExecuteBehaviour = async () => 0) {}

  init(): void {}

  async executeBenchmark(benchmark: Benchmark, outputHandler: OutputHandler): Promise<number> {
    this.executed.push(benchmark.name);
    return this.behaviour(benchmark, outputHandler);
  }

  getSystemInfo(): SystemInfo {
    return SYSTEM_INFO;
  }

  stop(): void {
    this.stopCalls += 1;
  }
}

/** Loader that skips parsing: every definition file becomes a benchmark with one empty run set */
export function fakeLoader(outputDir: string, loaded: Benchmark[] = []): BenchmarkLoader {
  return async (file, _config, startTime) => {
    const name = basename(file, extname(file));
    const benchmark = makeBenchmark(join(outputDir, `${name}.${formatInstance(startTime)}`), [makeRunSet([])], {
      name,
      definitionFile: file,
      startTime,
    });
    loaded.push(benchmark);
    return benchmark;
  };
}

/** Writes empty definition files so that the command line accepts them */
export async function writeDefinitions(dir: string, ...names: string[]): Promise<string[]> {
  const files = names.map((name) => join(dir, `${name}.yml`));
  await Promise.all(files.map((file) => writeFile(file, 'tool: echo\n', 'utf-8')));
  return files;
}

export const quietParserOutput = {
  writeOut: (): void => {},
  writeErr: (): void => {},
};
