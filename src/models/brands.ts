/**
 * Branded types to keep free-text statuses apart from verdicts
 */

declare const brand: unique symbol;

export type Brand<T, TBrand extends string> = T & { readonly [brand]: TBrand };

/**
 * A run status outside the verdict taxonomy: execution failures, missing
 * output and the timeout marker.
 */
export type ErrorStatus = Brand<string, 'ErrorStatus'>;

export function asErrorStatus(value: string): ErrorStatus {
  if (value.trim().length === 0) {
    throw new Error('Error status must not be empty');
  }
  return value as ErrorStatus;
}
