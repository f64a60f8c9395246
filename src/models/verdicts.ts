/**
 * Canonical verdict taxonomy for classified runs
 */

import { asErrorStatus, type ErrorStatus } from './brands.js';

export const Verdicts = {
  TRUE_PROP: 'true',
  FALSE_REACH: 'false(reach)',
  FALSE_DEREF: 'false(valid-deref)',
  FALSE_FREE: 'false(valid-free)',
  FALSE_TERMINATION: 'false(termination)',
  UNKNOWN: 'unknown',
} as const;

export type Verdict = (typeof Verdicts)[keyof typeof Verdicts];

// Every run ends with one of these, never with an absent value
export type RunStatus = Verdict | ErrorStatus;

const VERDICT_VALUES: ReadonlySet<string> = new Set(Object.values(Verdicts));

export function isVerdict(status: string): status is Verdict {
  return VERDICT_VALUES.has(status);
}

export function isErrorStatus(status: RunStatus): status is ErrorStatus {
  return !isVerdict(status);
}

export type VerdictCategory = 'true' | 'false' | 'unknown' | 'error';

export function categoryOf(status: RunStatus): VerdictCategory {
  if (!isVerdict(status)) {
    return 'error';
  }
  switch (status) {
    case 'true':
      return 'true';
    case 'false(reach)':
    case 'false(valid-deref)':
    case 'false(valid-free)':
    case 'false(termination)':
      return 'false';
    case 'unknown':
      return 'unknown';
    default:
      return assertNever(status);
  }
}

export const TIMEOUT_STATUS: ErrorStatus = asErrorStatus('timeout');
export const NO_OUTPUT_STATUS: ErrorStatus = asErrorStatus('error (no output)');
export const UNKNOWN_ERROR_STATUS: ErrorStatus = asErrorStatus('error (unknown)');

export function errorStatus(message: string): ErrorStatus {
  return asErrorStatus(`error (${message})`);
}

export function failedStatus(returnCode: number, returnSignal: number | undefined): ErrorStatus {
  const suffix = returnSignal === undefined ? '' : ` (signal: ${returnSignal})`;
  return asErrorStatus(`Failed with returncode: ${returnCode}${suffix}`);
}

// Exhaustiveness checking
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
