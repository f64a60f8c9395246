/**
 * Process entry around BenchmarkOrchestrator.start()
 */

import { CommanderError } from 'commander';
import { BenchmarkOrchestrator } from './orchestrator.js';
import { ExistingResultsError, describeError } from '../models/index.js';

export const INTERRUPTED_MESSAGE = 'Script was interrupted by user, some runs may not be done.';
export const INTERRUPTED_EXIT_CODE = 130;

export interface MainOptions {
  signals?: NodeJS.EventEmitter;
  print?: (message: string) => void;
  printError?: (message: string) => void;
}

/**
 * Run the orchestrator and return the exit code of the process.
 * SIGTERM is logged and ignored so that result files are not cut off
 * mid-write; SIGINT stops the execution.
 */
export async function main(
  orchestrator: BenchmarkOrchestrator = new BenchmarkOrchestrator(),
  argv: readonly string[] = process.argv.slice(2),
  options: MainOptions = {}
): Promise<number> {
  const signals = options.signals ?? process;
  const print = options.print ?? ((message: string) => console.log(message));
  const printError = options.printError ?? ((message: string) => console.error(message));

  let interrupted = false;

  const onTerminate = (signal: NodeJS.Signals): void => {
    const logger = orchestrator.activeLogger;
    if (logger) {
      logger.warn({ signal }, `Received signal ${signal}, ignoring it`);
    } else {
      printError(`Received signal ${signal}, ignoring it`);
    }
  };

  const onInterrupt = (): void => {
    orchestrator.stop();
    if (!interrupted) {
      interrupted = true;
      print(`\n\n${INTERRUPTED_MESSAGE}`);
    }
  };

  signals.on('SIGTERM', onTerminate);
  signals.on('SIGINT', onInterrupt);

  try {
    return await orchestrator.start(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof ExistingResultsError) {
      printError(error.message);
      return 1;
    }

    const logger = orchestrator.activeLogger;
    if (logger) {
      logger.error({ error: describeError(error) }, 'Benchmark execution failed');
    } else {
      printError(describeError(error));
    }
    return interrupted ? INTERRUPTED_EXIT_CODE : 1;
  } finally {
    signals.off('SIGTERM', onTerminate);
    signals.off('SIGINT', onInterrupt);
  }
}
