/**
 * Named errors for the exceptional paths of a benchmark execution
 */

export class ToolNotFoundError extends Error {
  constructor(readonly executableName: string) {
    super(`Could not find executable '${executableName}' on the search path`);
    this.name = 'ToolNotFoundError';
  }
}

export class UnsupportedTasksError extends Error {
  constructor(
    readonly toolName: string,
    readonly taskCount: number,
    readonly maxTasks: number
  ) {
    super(`${toolName} supports at most ${maxTasks} input file(s) per run, got ${taskCount}`);
    this.name = 'UnsupportedTasksError';
  }
}

export class ExistingResultsError extends Error {
  constructor(readonly folder: string) {
    super(`Output directory ${folder} already exists, will not overwrite existing results.`);
    this.name = 'ExistingResultsError';
  }
}

export class BenchmarkDefinitionError extends Error {
  constructor(
    message: string,
    readonly file: string
  ) {
    super(`${file}: ${message}`);
    this.name = 'BenchmarkDefinitionError';
  }
}

export class GitRepositoryError extends Error {
  constructor(
    message: string,
    readonly repositoryPath: string
  ) {
    super(message);
    this.name = 'GitRepositoryError';
  }
}
