import type { ErrorFactory } from '../core/ErrorFactory';
import { WaveErrorKind, type WaveError } from '../types';

/**
 * Origin for {@link ByteSource.seek}.
 */
export enum SeekOrigin {
  Start,
  Current,
  End,
}

/**
 * A readable, seekable sequence of bytes, such as an open file.
 *
 * Implementations may throw on I/O failure; the loaders turn those throws
 * into `IoFailure` results.
 */
export interface ByteSource {
  /** Current absolute read position. */
  readonly position: number;

  /**
   * Reads up to `target.length` bytes at the current position and advances past them.
   * @returns The number of bytes read; `0` at end of source.
   */
  read(target: Uint8Array): number;

  /** Moves the read position. Defaults to {@link SeekOrigin.Start}. */
  seek(offset: number, origin?: SeekOrigin): void;
}

/**
 * Fills `target` from the current position of `source`.
 * @returns `null` on success, or an `IoFailure` for a throw or a short read.
 */
export function readExactly(source: ByteSource, target: Uint8Array, errors: ErrorFactory): WaveError | null {
  const start = source.position;
  let filled = 0;

  try {
    while (filled < target.length) {
      const bytesRead = source.read(target.subarray(filled));
      if (bytesRead <= 0) break;
      filled += bytesRead;
    }
  } catch (error) {
    return errors.fromException(WaveErrorKind.IoFailure, error, start + filled);
  }

  if (filled < target.length) {
    return errors.create(
      WaveErrorKind.IoFailure,
      `Unexpected end of stream at byte ${start + filled}: expected ${target.length} bytes, read ${filled}`,
      start + filled
    );
  }
  return null;
}

export function seekTo(source: ByteSource, offset: number, errors: ErrorFactory): WaveError | null {
  try {
    source.seek(offset, SeekOrigin.Start);
  } catch (error) {
    return errors.fromException(WaveErrorKind.IoFailure, error, offset);
  }
  return null;
}
