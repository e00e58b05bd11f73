// ── Memory Errors ────────────────────────────────────────

/**
 * A value broke the memory contract: a score outside [0, 1], a non-finite
 * timestamp, an unknown lifecycle state. Fatal to the call that raised it.
 */
export class ValidationError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field}: ${reason} (got ${formatValue(value)})`);
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

// ── Helpers ──────────────────────────────────────────────

/** Throws a ValidationError unless `value` is a finite number in [0, 1]. */
export function assertUnitInterval(field: string, value: number): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(field, value, "must be a finite number");
  }
  if (value < 0 || value > 1) {
    throw new ValidationError(field, value, "must be within [0, 1]");
  }
}

export function assertTimestamp(field: string, value: number): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(field, value, "must be a finite Unix ms timestamp");
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}
