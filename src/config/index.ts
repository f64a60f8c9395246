/**
 * Command-line configuration
 * Parses arguments once into an immutable Config snapshot
 */

import { readFileSync, statSync } from 'node:fs';
import { dirname, normalize, resolve, sep } from 'node:path';
import { Command, InvalidArgumentError, type OutputConfiguration } from 'commander';
import { ConfigSchema, LogLevelSchema, type Config, type LogLevel } from './schema.js';
import { describeError } from '../models/index.js';

export const VERSION = '0.1.0';
export const DEFAULT_OUTPUT_PATH = 'results/';

interface CommandLineOptions {
  debug: boolean;
  rundefinition: string[];
  tasks: string[];
  name?: string;
  outputpath: string;
  timelimit?: number;
  memorylimit?: number;
  numOfThreads?: number;
  limitCores?: number;
  maxLogfileSize: number;
  commit: boolean;
  message: string;
  startTime?: Date;
}

export interface ParseOptions {
  env?: NodeJS.ProcessEnv;
  output?: OutputConfiguration;
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function getEnvLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const parsed = LogLevelSchema.safeParse(env['LOG_LEVEL']);
  return parsed.success ? parsed.data : 'info';
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Parse a time stamp in the "year-month-day hour:minute" format, local time.
 */
export function parseTimeArg(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new InvalidArgumentError(`time data '${value}' does not match format 'YYYY-MM-DD hh:mm'`);
  }
  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (year === undefined || month === undefined || day === undefined || hour === undefined || minute === undefined) {
    throw new InvalidArgumentError(`time data '${value}' does not match format 'YYYY-MM-DD hh:mm'`);
  }
  const date = new Date(year, month - 1, day, hour, minute);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hour ||
    date.getMinutes() !== minute
  ) {
    throw new InvalidArgumentError(`'${value}' is not a valid date and time`);
  }
  return date;
}

/**
 * Replace every "@file" argument by the lines of that file, recursively.
 * Relative "@" references inside a file are resolved against the process
 * working directory.
 */
export function expandArgumentFiles(argv: readonly string[], seen: ReadonlySet<string> = new Set()): string[] {
  const expanded: string[] = [];
  for (const arg of argv) {
    if (!arg.startsWith('@') || arg.length === 1) {
      expanded.push(arg);
      continue;
    }
    const file = resolve(arg.slice(1));
    if (seen.has(file)) {
      throw new Error(`Argument file ${arg.slice(1)} includes itself`);
    }
    const lines = readFileSync(file, 'utf-8')
      .split(/\r?\n/)
      .filter((line) => line.length > 0);
    expanded.push(...expandArgumentFiles(lines, new Set([...seen, file])));
  }
  return expanded;
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** An existing output directory always ends with a separator, so it is used as a folder and not as a file prefix. */
export function normalizeOutputPath(outputPath: string): string {
  if (!isDirectory(outputPath)) {
    return outputPath;
  }
  const trimmed = normalize(outputPath).replace(/[\\/]+$/, '');
  return trimmed.length === 0 ? sep : `${trimmed}${sep}`;
}

export function createArgumentParser(defaultOutputPath = DEFAULT_OUTPUT_PATH): Command {
  return new Command()
    .name('benchrunner')
    .description(
      'Execute benchmarks for a given tool with a set of input files. ' +
        'Benchmarks are defined in YAML or JSON files given as input. ' +
        "Command-line parameters can additionally be read from a file if its name is given prefixed with '@'."
    )
    .version(VERSION, '--version')
    .argument('<files...>', 'benchmark definition file(s)')
    .option('-d, --debug', 'Enable debug output', false)
    .option(
      '-r, --rundefinition <name>',
      'Run only the specified run definition from the benchmark definition file (repeatable)',
      collect,
      []
    )
    .option('-t, --tasks <name>', 'Run only the tasks from the task set with this name (repeatable)', collect, [])
    .option('-n, --name <name>', 'Set name of benchmark execution to NAME')
    .option(
      '-o, --outputpath <path>',
      'Output prefix for the generated results. If the path is a folder files are put into it, ' +
        'otherwise it is used as a prefix for the resulting files.',
      defaultOutputPath
    )
    .option('-T, --timelimit <seconds>', 'Time limit in seconds for each run (-1 to disable)', parseInteger)
    .option('-M, --memorylimit <mb>', 'Memory limit in MB (-1 to disable)', parseInteger)
    .option('-N, --numOfThreads <n>', 'Run n benchmarks in parallel', parseInteger)
    .option('-c, --limitCores <n>', 'Limit each run of the tool to N CPU cores (-1 to disable)', parseInteger)
    .option(
      '--maxLogfileSize <mb>',
      'Shrink logfiles to given size in MB, if they are too big. (-1 to disable, default value: 20 MB)',
      parseInteger,
      20
    )
    .option('--commit', 'If the output path is a git repository without local changes, add and commit the result files', false)
    .option('--message <text>', 'Commit message if --commit is used', 'Results for benchmark run')
    .option('--startTime <time>', "Set the given date and time ('YYYY-MM-DD hh:mm') as the start time of the benchmark", parseTimeArg)
    .exitOverride();
}

/**
 * Parse the command line. Usage errors, --help and --version surface as a
 * CommanderError carrying the exit code.
 */
export function parseArguments(argv: readonly string[], options: ParseOptions = {}): Config {
  const env = options.env ?? process.env;
  const program: Command = createArgumentParser(env['BENCHRUNNER_OUTPUT_PATH'] ?? DEFAULT_OUTPUT_PATH);
  if (options.output) {
    program.configureOutput(options.output);
  }

  let args: string[];
  try {
    args = expandArgumentFiles(argv);
  } catch (error) {
    program.error(`Cannot read argument file: ${describeError(error)}`, { code: 'benchrunner.argumentFile' });
  }

  program.parse(args, { from: 'user' });
  const opts = program.opts<CommandLineOptions>();
  const files = program.args;

  // Report every missing file, not only the first one
  const missing = files.filter((file) => !isRegularFile(file));
  if (missing.length > 0) {
    program.error(missing.map((file) => `File '${file}' does not exist.`).join('\n'), {
      code: 'benchrunner.missingFile',
    });
  }

  const parsed = ConfigSchema.safeParse({
    files,
    selectedRunDefinitions: opts.rundefinition,
    selectedTaskSets: opts.tasks,
    name: opts.name,
    outputPath: normalizeOutputPath(opts.outputpath),
    timelimit: opts.timelimit,
    memorylimit: opts.memorylimit,
    corelimit: opts.limitCores,
    numOfThreads: opts.numOfThreads,
    maxLogfileSize: opts.maxLogfileSize,
    commit: opts.commit,
    commitMessage: opts.message,
    startTime: opts.startTime,
    debug: opts.debug,
    logging: {
      level: opts.debug ? 'debug' : getEnvLogLevel(env),
      pretty: getEnvBoolean(env, 'LOG_PRETTY') ?? process.stdout.isTTY === true,
    },
  });
  if (!parsed.success) {
    program.error(`Invalid configuration: ${parsed.error.message}`, { code: 'benchrunner.invalidConfig' });
  }
  return parsed.data;
}

/** Folder the results of a run land in, whether the output path is a folder or a file prefix. */
export function outputDirectory(config: Config): string {
  return config.outputPath.endsWith(sep) ? config.outputPath : dirname(config.outputPath);
}

export type { Config, ConfigInput, LogLevel } from './schema.js';
export { ConfigSchema } from './schema.js';
