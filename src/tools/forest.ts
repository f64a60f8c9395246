/**
 * Forest verifier
 */

import { BaseTool, findExecutable, versionFromTool } from './base.js';
import { Verdicts, failedStatus, type RunStatus, type Verdict } from '../models/verdicts.js';
import type { ResourceLimits } from '../models/benchmark.js';

// Later entries override earlier ones when several markers are present
const MARKERS: ReadonlyArray<readonly [string, Verdict]> = [
  ['TRUE', Verdicts.TRUE_PROP],
  ['FALSE_REACH', Verdicts.FALSE_REACH],
  ['FALSE_DEREF', Verdicts.FALSE_DEREF],
  ['FALSE_FREE', Verdicts.FALSE_FREE],
];

export class ForestTool extends BaseTool {
  executable(): string {
    return findExecutable('forest');
  }

  name(): string {
    return 'Forest';
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
    const property = propertyFile === undefined ? [] : ['-propertyfile', propertyFile];
    return [executable, ...property, ...options, '-svcomp_only_output', task];
  }

  determineResult(
    returnCode: number,
    returnSignal: number | undefined,
    output: readonly string[],
    _isTimeout: boolean
  ): RunStatus {
    const text = output.join('\n');
    let status: Verdict | null = null;
    for (const [marker, verdict] of MARKERS) {
      if (text.includes(marker)) {
        status = verdict;
      }
    }
    if (status !== null) {
      return status;
    }
    if (returnCode !== 0) {
      return failedStatus(returnCode, returnSignal);
    }
    return Verdicts.UNKNOWN;
  }
}
