export type PipelineErrorKind =
  | "MalformedInput"
  | "NoHandlerMatch"
  | "SynthesisFailure"
  | "RegistryRace";

/**
 * Error carrying a machine-readable kind. Only `MalformedInput` ever reaches
 * a caller of the pipeline; the other kinds are logged and degraded.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.cause = cause;
  }
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = PipelineError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
