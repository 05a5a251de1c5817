export type EngineErrorKind =
  | 'InvalidParameter'
  | 'InsufficientData'
  | 'NotFound'
  | 'UpstreamUnavailable';

export interface EngineError {
  kind: EngineErrorKind;
  message: string;
  cause?: unknown;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(kind: EngineErrorKind, message: string, cause?: unknown): Result<T> => ({
  ok: false,
  error: cause === undefined ? { kind, message } : { kind, message, cause },
});

/**
 * Thrown by {@link unwrap} for callers that prefer exceptions over branching on a Result.
 */
export class EngineFailure extends Error {
  public readonly kind: EngineErrorKind;

  constructor(error: EngineError) {
    super(error.message, error.cause === undefined ? undefined : { cause: error.cause });
    this.name = 'EngineFailure';
    this.kind = error.kind;
  }
}

export const unwrap = <T>(result: Result<T>): T => {
  if (!result.ok) throw new EngineFailure(result.error);
  return result.value;
};
