import * as fs from 'node:fs';
import { type ByteSource, SeekOrigin } from './ByteSource';
import { type ErrorFactory, failure, ok } from '../core/ErrorFactory';
import { WaveErrorKind, type WaveResult } from '../types';

/**
 * A ByteSource over a file opened read-only with synchronous `fs` calls.
 */
export class FileSource implements ByteSource {
  private fd: number | null;
  private _position = 0;

  private constructor(fd: number) {
    this.fd = fd;
  }

  public static open(path: string): FileSource {
    return new FileSource(fs.openSync(path, 'r'));
  }

  public get position(): number {
    return this._position;
  }

  public get closed(): boolean {
    return this.fd === null;
  }

  public read(target: Uint8Array): number {
    const bytesRead = fs.readSync(this.descriptor(), target, 0, target.length, this._position);
    this._position += bytesRead;
    return bytesRead;
  }

  public seek(offset: number, origin: SeekOrigin = SeekOrigin.Start): void {
    let base = 0;
    if (origin === SeekOrigin.Current) base = this._position;
    else if (origin === SeekOrigin.End) base = fs.fstatSync(this.descriptor()).size;

    const next = base + offset;
    if (next < 0) throw new RangeError(`Cannot seek before the start of the file (${next})`);
    this._position = next;
  }

  /** Closes the descriptor. Closing twice is a no-op. */
  public close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }

  private descriptor(): number {
    if (this.fd === null) throw new Error('[FileSource] file is closed');
    return this.fd;
  }
}

/**
 * Opens `path` and measures it by seeking to the end and rewinding.
 */
export function openFileSource(
  path: string,
  errors: ErrorFactory
): WaveResult<{ source: FileSource; length: number }> {
  let source: FileSource;
  try {
    source = FileSource.open(path);
  } catch (error) {
    return failure(errors.fromException(WaveErrorKind.IoFailure, error));
  }

  try {
    source.seek(0, SeekOrigin.End);
    const length = source.position;
    source.seek(0, SeekOrigin.Start);
    return ok({ source, length });
  } catch (error) {
    source.close();
    return failure(errors.fromException(WaveErrorKind.IoFailure, error));
  }
}
