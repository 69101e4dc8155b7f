/**
 * Mockwork Kernel — Validation Result Types
 *
 * Shared by the configuration loader and the scenario validator: input
 * that fails validation is reported as data, never thrown.
 */

export interface ValidationError {
  readonly message: string;
  /** Where in the input the problem was found, e.g. `mocks[0].setups[2]`. */
  readonly context?: string | undefined;
}

/**
 * - `ValidationResult<void>`: success has no value
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
