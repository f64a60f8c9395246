/**
 * Result type for expected failures
 * Used where the caller decides how a failure is reported
 */

export type Result<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function unwrapOrThrow<T>(result: Result<T, string>, toError: (message: string) => Error): T {
  if (result.ok) {
    return result.value;
  }
  throw toError(result.error);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
