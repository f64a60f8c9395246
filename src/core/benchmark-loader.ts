/**
 * Benchmark loader
 * Turns a YAML/JSON benchmark definition into the in-memory Benchmark model
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname, extname, resolve, sep } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import {
  BenchmarkDefinitionSchema,
  BenchmarkDefinitionError,
  describeError,
  unwrapOrThrow,
  type Benchmark,
  type BenchmarkDefinition,
  type ResourceLimits,
  type Run,
  type RunSet,
  type TaskSetDefinition,
} from '../models/index.js';
import { createToolAdapter, type ToolResolver } from '../tools/index.js';

export type BenchmarkLoader = (file: string, config: Config, startTime: Date) => Promise<Benchmark>;

export interface BenchmarkLoaderOptions {
  resolveTool?: ToolResolver;
  logger?: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as yy-MM-dd_HHmm, the suffix of every output file of one execution. */
export function formatInstance(date: Date): string {
  const year = pad(date.getFullYear() % 100);
  return `${year}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}

function overrideLimit(fromCommandLine: number | undefined, fromDefinition: number | undefined): number | undefined {
  if (fromCommandLine === undefined) {
    return fromDefinition;
  }
  return fromCommandLine === -1 ? undefined : fromCommandLine;
}

export function resolveLimits(definition: BenchmarkDefinition, config: Config): ResourceLimits {
  const limits: { timelimit?: number; memlimit?: number; corelimit?: number } = {};
  const timelimit = overrideLimit(config.timelimit, definition.timelimit);
  const memlimit = overrideLimit(config.memorylimit, definition.memlimit);
  const corelimit = overrideLimit(config.corelimit, definition.cpuCores);
  if (timelimit !== undefined) limits.timelimit = timelimit;
  if (memlimit !== undefined) limits.memlimit = memlimit;
  if (corelimit !== undefined) limits.corelimit = corelimit;
  return limits;
}

type PendingRun = Omit<Run, 'logFile'>;

function createRuns(
  taskSet: TaskSetDefinition,
  runDefinition: string,
  options: readonly string[],
  baseDir: string,
  globalPropertyFile: string | undefined
): PendingRun[] {
  const propertyFile = taskSet.propertyfile ?? globalPropertyFile;
  const resolvedProperty = propertyFile === undefined ? {} : { propertyFile: resolve(baseDir, propertyFile) };
  const runOptions = [...options, ...taskSet.options];

  const withFile = taskSet.include.map((file): PendingRun => {
    const task = resolve(baseDir, file);
    return { identifier: task, runDefinition, task, options: runOptions, ...resolvedProperty };
  });

  const withoutFile = taskSet.withoutFile.map(
    (identifier): PendingRun => ({ identifier, runDefinition, options: runOptions, ...resolvedProperty })
  );

  return [...withFile, ...withoutFile];
}

/**
 * Log files are named after the run definition and the task's base name.
 * Runs of one set sharing a base name get their 1-based position appended.
 */
function assignLogFiles(runs: readonly PendingRun[], runDefinition: string, logFolder: string): Run[] {
  const counts = new Map<string, number>();
  for (const run of runs) {
    const name = basename(run.identifier);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return runs.map((run, index): Run => {
    const name = basename(run.identifier);
    const suffix = (counts.get(name) ?? 0) > 1 ? `.${index + 1}` : '';
    return { ...run, logFile: `${logFolder}${runDefinition}.${name}${suffix}.log` };
  });
}

function warnUnmatched(logger: Logger | undefined, kind: string, selected: readonly string[], available: string[]): void {
  for (const name of selected) {
    if (!available.includes(name)) {
      logger?.warn({ [kind]: name, available }, `Selected ${kind} does not exist in benchmark definition`);
    }
  }
}

export function buildBenchmark(
  definition: BenchmarkDefinition,
  file: string,
  config: Config,
  startTime: Date,
  resolveTool: ToolResolver,
  logger?: Logger
): Omit<Benchmark, 'executable' | 'toolVersion'> {
  const tool = unwrapOrThrow(resolveTool(definition.tool), (message) => new BenchmarkDefinitionError(message, file));

  const baseName = basename(file, extname(file));
  const name = config.name ? `${baseName}.${config.name}` : baseName;
  const outputBase = `${config.outputPath}${name}.${formatInstance(startTime)}`;
  const logFolder = `${outputBase}.logfiles${sep}`;
  const baseDir = dirname(resolve(file));
  const globalPropertyFile = definition.propertyfile;

  warnUnmatched(logger, 'rundefinition', config.selectedRunDefinitions, definition.rundefinitions.map((r) => r.name));
  warnUnmatched(logger, 'tasks', config.selectedTaskSets, definition.tasks.map((t) => t.name));

  const taskSets =
    config.selectedTaskSets.length > 0
      ? definition.tasks.filter((taskSet) => config.selectedTaskSets.includes(taskSet.name))
      : definition.tasks;

  const runSets = definition.rundefinitions.map((runDefinition, index): RunSet => {
    const options = [...definition.options, ...runDefinition.options];
    const shouldBeExecuted =
      config.selectedRunDefinitions.length === 0 || config.selectedRunDefinitions.includes(runDefinition.name);
    return {
      name: runDefinition.name,
      index: index + 1,
      options,
      shouldBeExecuted,
      runs: assignLogFiles(
        taskSets.flatMap((taskSet) => createRuns(taskSet, runDefinition.name, options, baseDir, globalPropertyFile)),
        runDefinition.name,
        logFolder
      ),
    };
  });

  return {
    name,
    definitionFile: file,
    startTime,
    tool,
    toolName: tool.name(),
    rlimits: resolveLimits(definition, config),
    outputBase,
    logFolder,
    runSets,
  };
}

export async function readBenchmarkDefinition(file: string): Promise<BenchmarkDefinition> {
  let document: unknown;
  try {
    document = parseYaml(await readFile(file, 'utf-8'));
  } catch (error) {
    throw new BenchmarkDefinitionError(`Cannot read benchmark definition: ${describeError(error)}`, file);
  }

  const parsed = BenchmarkDefinitionSchema.safeParse(document);
  if (!parsed.success) {
    throw new BenchmarkDefinitionError(`Invalid benchmark definition: ${parsed.error.message}`, file);
  }
  return parsed.data;
}

export function createBenchmarkLoader(options: BenchmarkLoaderOptions = {}): BenchmarkLoader {
  const resolveTool = options.resolveTool ?? createToolAdapter;
  return async (file, config, startTime) => {
    const definition = await readBenchmarkDefinition(file);
    const model = buildBenchmark(definition, file, config, startTime, resolveTool, options.logger);
    const executable = model.tool.executable();
    const toolVersion = await model.tool.version(executable);
    return { ...model, executable, toolVersion };
  };
}
