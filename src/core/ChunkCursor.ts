import { CHUNK_HEADER_SIZE } from '../constants';
import { type ByteSource, readExactly, seekTo } from '../buffer/ByteSource';
import { readChunkHeader } from '../utils/records';
import { type ParseOptions, type RiffChunk, WaveErrorKind, type WaveError, type WaveResult } from '../types';
import { type ErrorFactory, failure, ok } from './ErrorFactory';

/**
 * Random access to chunk headers, either in memory or through a seekable stream.
 */
export interface ChunkSource {
  /** Absolute position one past the last readable byte. */
  readonly length: number;
  readChunkHeader(offset: number): WaveResult<{ id: string; size: number }>;
}

export class BufferChunkSource implements ChunkSource {
  private readonly buffer: Uint8Array;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
  }

  public get length(): number {
    return this.buffer.length;
  }

  public readChunkHeader(offset: number): WaveResult<{ id: string; size: number }> {
    return ok(readChunkHeader(this.buffer, offset));
  }
}

/**
 * Reads chunk headers by seeking the stream to them. After a successful read
 * the stream is positioned at the chunk's first payload byte.
 */
export class StreamChunkSource implements ChunkSource {
  private readonly source: ByteSource;
  private readonly errors: ErrorFactory;
  private readonly scratch = new Uint8Array(CHUNK_HEADER_SIZE);
  public readonly length: number;

  constructor(source: ByteSource, length: number, errors: ErrorFactory) {
    this.source = source;
    this.length = length;
    this.errors = errors;
  }

  public readChunkHeader(offset: number): WaveResult<{ id: string; size: number }> {
    const error = seekTo(this.source, offset, this.errors) ?? readExactly(this.source, this.scratch, this.errors);
    if (error) return failure(error);
    return ok(readChunkHeader(this.scratch, 0));
  }
}

/**
 * Lazily walks the chunks between `start` and `end`.
 *
 * Each step reads one chunk header, yields it, and moves to
 * `offset + 8 + size`, rounded up to an even boundary. Iteration ends when
 * fewer than 8 bytes remain before `end`. A payload running past the end of
 * the source, a failed read, or more than `maxChunks` chunks stops the walk
 * and leaves the reason in {@link ChunkCursor.error}.
 *
 * The cursor is not restartable: iterating it again continues where the
 * previous iteration stopped.
 */
export class ChunkCursor implements Iterable<RiffChunk> {
  private readonly source: ChunkSource;
  private readonly errors: ErrorFactory;
  private readonly end: number;
  private readonly maxChunks: number;
  private _offset: number;
  private _count = 0;
  private _error: WaveError | null = null;

  constructor(source: ChunkSource, start: number, end: number, errors: ErrorFactory, options: ParseOptions = {}) {
    this.source = source;
    this.errors = errors;
    this.end = Math.min(end, source.length);
    this.maxChunks = options.maxChunks ?? Number.POSITIVE_INFINITY;
    this._offset = start;
  }

  public get offset(): number {
    return this._offset;
  }

  public get count(): number {
    return this._count;
  }

  public get error(): WaveError | null {
    return this._error;
  }

  public *[Symbol.iterator](): Iterator<RiffChunk> {
    while (this._error === null && this._offset + CHUNK_HEADER_SIZE <= this.end) {
      const offset = this._offset;

      if (this._count >= this.maxChunks) {
        this._error = this.errors.create(
          WaveErrorKind.MalformedContainer,
          `Chunk scan stopped after reaching the maximum of ${this.maxChunks} chunks`,
          offset
        );
        return;
      }

      const header = this.source.readChunkHeader(offset);
      if (!header.ok) {
        this._error = header.error;
        return;
      }

      const { id, size } = header.value;
      const payloadOffset = offset + CHUNK_HEADER_SIZE;
      if (payloadOffset + size > this.source.length) {
        this._error = this.errors.create(
          WaveErrorKind.MalformedContainer,
          `Chunk "${id}" at byte ${offset} declares ${size} bytes but only ${this.source.length - payloadOffset} are available`,
          offset
        );
        return;
      }

      this._count++;
      this._offset = payloadOffset + size + (size & 1);
      yield { id, size, offset, payloadOffset };
    }
  }
}

export type ChunkHandler = (chunk: RiffChunk) => WaveError | null;

/**
 * Per-tag strategy for {@link walkChunks}. Tags without a handler are skipped.
 */
export type ChunkHandlers = Partial<Record<string, ChunkHandler>>;

/**
 * Drives `cursor` to the end, dispatching each chunk to its handler.
 * @returns The first error raised by a handler or by the cursor, otherwise `null`.
 */
export function walkChunks(cursor: ChunkCursor, handlers: ChunkHandlers): WaveError | null {
  for (const chunk of cursor) {
    const handler = handlers[chunk.id];
    if (!handler) continue;
    const error = handler(chunk);
    if (error) return error;
  }
  return cursor.error;
}
