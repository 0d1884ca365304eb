export type ModelErrorKind =
  | "malformed-arc"
  | "unresolved-reference"
  | "unbound-variable"
  | "already-frozen"
  | "not-frozen"
  | "sealed"
  | "invalid-binding"
  | "invalid-value"
  | "invalid-snapshot";

/** Every configuration or compile failure in a model surfaces as this. */
export class ModelError extends Error {
  readonly kind: ModelErrorKind;

  constructor(kind: ModelErrorKind, message: string) {
    super(message);
    this.name = "ModelError";
    this.kind = kind;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ModelError };

export function isModelError(err: unknown): err is ModelError {
  return err instanceof ModelError;
}

export function assertCount(value: number, what: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ModelError(
      "invalid-value",
      `${what} must be a non-negative integer, got ${value}`,
    );
  }
  return value;
}
