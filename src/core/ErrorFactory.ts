import type { Failure, Success, WaveError, WaveErrorKind } from '../types';

/**
 * Creates standardized WaveError objects tagged with the source being read.
 */
export class ErrorFactory {
  private readonly source: string;

  constructor(source: string) {
    this.source = source;
  }

  public create(kind: WaveErrorKind, message: string, offset = 0): WaveError {
    return {
      kind,
      message,
      offset,
      source: this.source,
    };
  }

  public fromException(kind: WaveErrorKind, error: unknown, offset = 0): WaveError {
    const message = error instanceof Error ? error.message : String(error);
    return this.create(kind, message, offset);
  }

  public fail(kind: WaveErrorKind, message: string, offset = 0): Failure {
    return { ok: false, error: this.create(kind, message, offset) };
  }
}

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(error: WaveError): Failure {
  return { ok: false, error };
}
