/**
 * AProVE termination prover
 */

import { BaseTool, findExecutable } from './base.js';
import { Verdicts, failedStatus, type RunStatus } from '../models/verdicts.js';

export class AproveTool extends BaseTool {
  protected override readonly requiredPaths = ['aprove.jar', 'AProVE.sh', 'bin', 'newstrategy.strategy'];

  executable(): string {
    return findExecutable('AProVE.sh');
  }

  name(): string {
    return 'AProVE';
  }

  // First match wins: YES, TRUE, FALSE, NO
  determineResult(
    returnCode: number,
    returnSignal: number | undefined,
    output: readonly string[],
    _isTimeout: boolean
  ): RunStatus {
    const text = output.join('\n');
    if (text.includes('YES')) {
      return Verdicts.TRUE_PROP;
    }
    if (text.includes('TRUE')) {
      return Verdicts.TRUE_PROP;
    }
    if (text.includes('FALSE')) {
      return Verdicts.FALSE_TERMINATION;
    }
    if (text.includes('NO')) {
      return Verdicts.FALSE_TERMINATION;
    }
    if (returnCode !== 0) {
      return failedStatus(returnCode, returnSignal);
    }
    return Verdicts.UNKNOWN;
  }
}
