/**
 * Shared validation helpers for accumulate-errors validators.
 *
 * Used by the config and message decoders. Each check function pushes
 * errors onto a shared array so callers can report all problems at once.
 *
 * @module
 */

// ============================================================================
// Result type
// ============================================================================

/** Outcome of an accumulate-errors validation pass. */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Build a {@link ValidationResult} from an error list. */
export function validationResult(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

// ============================================================================
// Field checks
// ============================================================================

/** Push an error if `value` is not a non-empty string. */
export function requireNonEmptyString(
  value: unknown,
  field: string,
  errors: string[],
): void {
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`${field} must be a non-empty string`);
  }
}

/** Push an error if `value` is not a boolean. */
export function requireBoolean(
  value: unknown,
  field: string,
  errors: string[],
): void {
  if (typeof value !== "boolean") {
    errors.push(`${field} must be a boolean`);
  }
}

/** Push an error if `value` is not a finite number >= `min`. */
export function requireNumberAtLeast(
  value: unknown,
  field: string,
  min: number,
  errors: string[],
): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    errors.push(`${field} must be a finite number >= ${min}`);
  }
}

/** Push an error if `value` is not a finite number in [min, max]. */
export function requireNumberInRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be a finite number between ${min} and ${max}`);
  }
}

/** Push an error if `value` is not one of the allowed strings. */
export function requireOneOf(
  value: unknown,
  field: string,
  allowed: ReadonlySet<string>,
  errors: string[],
): void {
  if (typeof value !== "string" || !allowed.has(value)) {
    errors.push(`${field} must be one of: ${[...allowed].join(", ")}`);
  }
}

/** Push an error if `value` is not an integer in [min, max]. */
export function requireIntRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be an integer between ${min} and ${max}`);
  }
}
