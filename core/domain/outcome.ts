// core/domain/outcome.ts

/** Failure kinds the engine recovers from locally. None of them reach the caller. */
export type FailureKind =
  | "collaborator_unavailable"
  | "malformed_input_date"
  | "degenerate_vectorization"
  | "invalid_input";

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: FailureKind; error: string };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(kind: FailureKind, error: string): Outcome<T> {
  return { ok: false, kind, error };
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "UNKNOWN_ERROR";
}

export function clamp01(x: number): number {
  if (Number.isNaN(x)) return 0;
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}
