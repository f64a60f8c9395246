/**
 * benchrunner - runs analysis tools over benchmark task sets and classifies
 * their output into verdicts
 */

export * from './models/index.js';
export * from './tools/index.js';
export * from './executors/index.js';
export {
  parseArguments,
  parseTimeArg,
  expandArgumentFiles,
  createArgumentParser,
  VERSION,
  type Config,
} from './config/index.js';
export {
  createBenchmarkLoader,
  buildBenchmark,
  readBenchmarkDefinition,
  formatInstance,
  type BenchmarkLoader,
} from './core/benchmark-loader.js';
export { BenchmarkOrchestrator, type OrchestratorDependencies } from './core/orchestrator.js';
export { main, INTERRUPTED_MESSAGE, type MainOptions } from './core/main.js';
export {
  ResultsOutputHandler,
  createResultsOutputHandler,
  type OutputHandler,
  type OutputHandlerFactory,
} from './services/output-handler.js';
export { addFilesToGitRepository, type GitPersistence } from './services/git.js';
export { createLogger, setupLogging, type Logger } from './utils/logger.js';
