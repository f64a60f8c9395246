/**
 * Command-line configuration tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join, sep } from 'node:path';
import { CommanderError } from 'commander';
import {
  expandArgumentFiles,
  normalizeOutputPath,
  outputDirectory,
  parseArguments,
  parseTimeArg,
  VERSION,
} from '../src/config/index.js';
import { makeConfig, makeTempDir } from './helpers.js';

const written: string[] = [];
const quiet = {
  writeOut: (text: string) => {
    written.push(text);
  },
  writeErr: (text: string) => {
    written.push(text);
  },
};

function parse(argv: string[], env: NodeJS.ProcessEnv = {}) {
  return parseArguments(argv, { env, output: quiet });
}

function parseError(argv: string[]): CommanderError {
  try {
    parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the command line to be rejected');
}

describe('parseArguments', () => {
  let dir: string;
  let definition: string;

  beforeEach(async () => {
    written.length = 0;
    dir = await makeTempDir();
    definition = join(dir, 'bench.yml');
    await writeFile(definition, 'tool: forest\n', 'utf-8');
  });

  test('applies defaults', () => {
    const config = parse([definition]);
    expect(config.files).toEqual([definition]);
    expect(config.selectedRunDefinitions).toEqual([]);
    expect(config.maxLogfileSize).toBe(20);
    expect(config.commit).toBe(false);
    expect(config.commitMessage).toBe('Results for benchmark run');
    expect(config.startTime).toBeUndefined();
    expect(config.logging.level).toBe('info');
  });

  test('reports every missing file at once', () => {
    const missingA = join(dir, 'a.yml');
    const missingB = join(dir, 'b.yml');
    const error = parseError([missingA, definition, missingB]);
    expect(error.code).toBe('benchrunner.missingFile');
    expect(error.exitCode).toBe(1);
    expect(error.message).toBe(`File '${missingA}' does not exist.\nFile '${missingB}' does not exist.`);
  });

  test('treats a directory as missing', () => {
    const error = parseError([dir]);
    expect(error.message).toBe(`File '${dir}' does not exist.`);
  });

  test('collects repeatable and numeric options', () => {
    const config = parse([
      '-r', 'fast',
      '-r', 'slow',
      '-t', 'loops',
      '-n', 'nightly',
      '-T', '60',
      '-M', '-1',
      '-N', '4',
      '-c', '2',
      '--maxLogfileSize', '5',
      '--commit',
      '--message', 'Nightly results',
      definition,
    ]);
    expect(config.selectedRunDefinitions).toEqual(['fast', 'slow']);
    expect(config.selectedTaskSets).toEqual(['loops']);
    expect(config.name).toBe('nightly');
    expect(config.timelimit).toBe(60);
    expect(config.memorylimit).toBe(-1);
    expect(config.numOfThreads).toBe(4);
    expect(config.corelimit).toBe(2);
    expect(config.maxLogfileSize).toBe(5);
    expect(config.commit).toBe(true);
    expect(config.commitMessage).toBe('Nightly results');
  });

  test('rejects non-integer limits', () => {
    expect(parseError(['-T', 'soon', definition]).code).toBe('commander.invalidArgument');
  });

  test('rejects a thread count below one', () => {
    expect(parseError(['-N', '0', definition]).code).toBe('benchrunner.invalidConfig');
  });

  test('requires at least one file', () => {
    expect(parseError([]).code).toBe('commander.missingArgument');
  });

  test('parses --startTime', () => {
    const config = parse(['--startTime', '2024-03-05 09:07', definition]);
    expect(config.startTime).toEqual(new Date(2024, 2, 5, 9, 7));
  });

  test('rejects a malformed --startTime', () => {
    expect(parseError(['--startTime', '05.03.2024', definition]).code).toBe('commander.invalidArgument');
  });

  test('switches to debug logging with --debug', () => {
    expect(parse(['--debug', definition], { LOG_LEVEL: 'warn' }).logging.level).toBe('debug');
    expect(parse([definition], { LOG_LEVEL: 'warn' }).logging.level).toBe('warn');
    expect(parse([definition], { LOG_LEVEL: 'loud' }).logging.level).toBe('info');
  });

  test('reads pretty logging from the environment', () => {
    expect(parse([definition], { LOG_PRETTY: 'true' }).logging.pretty).toBe(true);
    expect(parse([definition], { LOG_PRETTY: '0' }).logging.pretty).toBe(false);
  });

  test('takes the default output path from the environment', () => {
    expect(parse([definition], { BENCHRUNNER_OUTPUT_PATH: 'nightly/out-' }).outputPath).toBe('nightly/out-');
  });

  test('normalizes an existing output directory to end with a separator', () => {
    const config = parse(['-o', dir, definition]);
    expect(config.outputPath).toBe(`${dir}${sep}`);
  });

  test('returns a frozen snapshot', () => {
    const config = parse([definition]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.files)).toBe(true);
  });

  test('expands @ argument files', async () => {
    const args = join(dir, 'args.txt');
    await writeFile(args, `-n\nnightly\n\n${definition}\n`, 'utf-8');
    const config = parse([`@${args}`]);
    expect(config.name).toBe('nightly');
    expect(config.files).toEqual([definition]);
  });

  test('exits with code 0 for --version', () => {
    const error = parseError(['--version']);
    expect(error.exitCode).toBe(0);
    expect(error.code).toBe('commander.version');
    expect(written).toEqual([`${VERSION}\n`]);
  });
});

describe('expandArgumentFiles', () => {
  test('expands nested argument files', async () => {
    const dir = await makeTempDir();
    const inner = join(dir, 'inner.txt');
    const outer = join(dir, 'outer.txt');
    await writeFile(inner, '-T\n60\n', 'utf-8');
    await writeFile(outer, `--debug\n@${inner}\n`, 'utf-8');

    expect(expandArgumentFiles([`@${outer}`, 'bench.yml'])).toEqual(['--debug', '-T', '60', 'bench.yml']);
  });

  test('rejects an argument file that includes itself', async () => {
    const dir = await makeTempDir();
    const file = join(dir, 'loop.txt');
    await writeFile(file, `@${file}\n`, 'utf-8');

    expect(() => expandArgumentFiles([`@${file}`])).toThrow('includes itself');
  });

  test('reports an unreadable argument file through the parser', () => {
    expect(parseError(['@/nonexistent/args.txt']).code).toBe('benchrunner.argumentFile');
  });
});

describe('parseTimeArg', () => {
  test('parses local date and time', () => {
    expect(parseTimeArg('2023-12-31 23:59')).toEqual(new Date(2023, 11, 31, 23, 59));
  });

  test('rejects impossible dates', () => {
    expect(() => parseTimeArg('2023-02-30 10:00')).toThrow("'2023-02-30 10:00' is not a valid date and time");
    expect(() => parseTimeArg('2023-02-01')).toThrow("does not match format 'YYYY-MM-DD hh:mm'");
  });
});

describe('output paths', () => {
  test('keeps a file prefix unchanged', () => {
    expect(normalizeOutputPath('/nonexistent/results/run-')).toBe('/nonexistent/results/run-');
  });

  test('strips duplicate trailing separators from directories', async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, 'out'));
    expect(normalizeOutputPath(`${join(dir, 'out')}//`)).toBe(`${join(dir, 'out')}${sep}`);
  });

  test('derives the output directory from a prefix', () => {
    expect(outputDirectory(makeConfig({ outputPath: 'results/' }))).toBe('results/');
    expect(outputDirectory(makeConfig({ outputPath: 'results/run-' }))).toBe('results');
  });
});
