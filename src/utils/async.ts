/**
 * Shared async utilities.
 * @module
 */

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize any thrown value into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
