/**
 * Symbiotic verifier
 * Prints exactly one of TRUE, FALSE or UNKNOWN on success.
 */

import { BaseTool, findExecutable, versionFromTool } from './base.js';
import {
  Verdicts,
  TIMEOUT_STATUS,
  NO_OUTPUT_STATUS,
  UNKNOWN_ERROR_STATUS,
  failedStatus,
  type RunStatus,
} from '../models/verdicts.js';
import type { ResourceLimits } from '../models/benchmark.js';

export class SymbioticTool extends BaseTool {
  protected override readonly requiredPaths = [
    'build-fix.sh',
    'path_to_ml.pl',
    'bin/klee',
    'bin/opt',
    'bin/clang',
    'bin/llvm-link',
    'bin/llvm-slicer',
    'lib.c',
    'lib/libllvmdg.so',
    'lib/LLVMsvc15.so',
    'lib/klee/runtime/kleeRuntimeIntrinsic.bc',
    'lib32/klee/runtime/kleeRuntimeIntrinsic.bc',
  ];

  executable(): string {
    return findExecutable('symbiotic');
  }

  name(): string {
    return 'symbiotic';
  }

  override version(executable: string): Promise<string> {
    return versionFromTool(executable);
  }

  override cmdline(
    executable: string,
    options: readonly string[],
    tasks: readonly string[],
    propertyFile: string | undefined,
    _rlimits: ResourceLimits
  ): string[] {
    const task = this.singleTask(tasks);
    const property = propertyFile === undefined ? [] : [`--prp=${propertyFile}`];
    return [executable, ...options, ...property, task];
  }

  determineResult(
    returnCode: number,
    returnSignal: number | undefined,
    output: readonly string[],
    isTimeout: boolean
  ): RunStatus {
    if (isTimeout) {
      return TIMEOUT_STATUS;
    }

    const text = output.join('\n').trim();
    switch (text) {
      case 'TRUE':
        return Verdicts.TRUE_PROP;
      case 'UNKNOWN':
        return Verdicts.UNKNOWN;
      case 'FALSE':
        return Verdicts.FALSE_REACH;
    }

    if (returnCode !== 0) {
      return failedStatus(returnCode, returnSignal);
    }
    return text.length === 0 ? NO_OUTPUT_STATUS : UNKNOWN_ERROR_STATUS;
  }
}
