/**
 * Typed engine failures and the result shape store commands return.
 */

export type EngineErrorKind =
  | "UnknownColumn"
  | "InvalidColumn"
  | "InvalidPattern"
  | "InvalidSizeColumn"
  | "InvalidColorMode"
  | "OutOfDomainParameter"
  | "UnknownFilter"
  | "UnknownView";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  /** Column or id the failure refers to, when there is one. */
  readonly subject: string | undefined;

  constructor(kind: EngineErrorKind, message: string, subject?: string) {
    super(message);
    this.name = "EngineError";
    this.kind = kind;
    this.subject = subject;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: EngineError): Result<T> {
  return { ok: false, error };
}

/**
 * Run `fn`, turning a thrown EngineError into a failed result.
 * Anything else is a bug and propagates.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (err: unknown) {
    if (err instanceof EngineError) return fail(err);
    throw err;
  }
}
