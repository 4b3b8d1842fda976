/**
 * Failure values shared by the translation and execution pipeline.
 *
 * The translator and executor never throw for expected failures; they return a
 * `Result` whose failure branch carries a kind tag so callers can decide how to
 * present it. Only configuration problems are thrown, because they are fatal
 * before any question is served.
 */

export type FailureKind = 'configuration' | 'translation' | 'execution';

export interface Failure {
  kind: FailureKind;
  /** Message suitable for showing to the user. */
  message: string;
  /** Underlying error text from the completion service or the database. */
  detail: string;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err {
  ok: false;
  failure: Failure;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail(kind: FailureKind, message: string, detail: string): Err {
  return { ok: false, failure: { kind, message, detail } };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export class ConfigurationError extends Error {
  readonly kind = 'configuration' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
