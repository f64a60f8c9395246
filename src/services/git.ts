/**
 * Commits result files to the git repository holding the output path
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { execa } from 'execa';
import { GitRepositoryError } from '../models/index.js';

export type GitPersistence = (outputPath: string, files: Iterable<string>, message: string) => Promise<void>;

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Add and commit the given files. Refuses to touch a repository that has
 * uncommitted changes to tracked files.
 */
export const addFilesToGitRepository: GitPersistence = async (outputPath, files, message) => {
  if (!(await isDirectory(outputPath))) {
    throw new GitRepositoryError('Output path is not a directory, cannot add files to git repository.', outputPath);
  }

  const root = await execa('git', ['rev-parse', '--show-toplevel'], { cwd: outputPath, reject: false });
  if (root.exitCode !== 0) {
    throw new GitRepositoryError(
      'Cannot commit results to repository: git rev-parse failed, perhaps output path is not a git directory?',
      outputPath
    );
  }
  const gitRoot = root.stdout.trim();

  const status = await execa('git', ['status', '--porcelain', '--untracked-files=no'], { cwd: gitRoot, reject: false });
  if (status.exitCode !== 0) {
    throw new GitRepositoryError(`git status failed: ${status.stderr.trim()}`, gitRoot);
  }
  if (status.stdout.trim().length > 0) {
    throw new GitRepositoryError('Git repository has local changes, not committing results.', gitRoot);
  }

  const paths = [...files].map((file) => resolve(file));
  if (paths.length === 0) {
    return;
  }
  await execa('git', ['add', '--force', '--', ...paths], { cwd: gitRoot });
  await execa('git', ['commit', '--file=-', '--quiet'], { cwd: gitRoot, input: message });
};
