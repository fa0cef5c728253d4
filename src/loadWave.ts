import { type Allocator, allocateBlock } from './buffer/allocators';
import { type ByteSource, readExactly } from './buffer/ByteSource';
import { openFileSource } from './buffer/FileSource';
import { ErrorFactory, failure, ok } from './core/ErrorFactory';
import { OwnedWave } from './core/WaveHandle';
import { decodeWaveBuffer } from './parseWaveBuffer';
import type { ParseOptions, WaveResult } from './types';

function loadFrom(
  source: ByteSource,
  byteLength: number,
  allocator: Allocator,
  errors: ErrorFactory,
  options: ParseOptions
): WaveResult<OwnedWave> {
  const allocation = allocateBlock(allocator, byteLength, errors);
  if (!allocation.ok) return allocation;

  const block = allocation.value;
  const bytes = block.subarray(0, byteLength);

  const readError = readExactly(source, bytes, errors);
  if (readError) {
    allocator.release(block);
    return failure(readError);
  }

  const parsed = decodeWaveBuffer(bytes, errors, options);
  if (!parsed.ok) {
    allocator.release(block);
    return parsed;
  }

  return ok(new OwnedWave(parsed.value, block, allocator));
}

/**
 * Reads `byteLength` bytes from the current position of `source` into a
 * block from `allocator` and parses them. The handle owns the block and gives
 * it back to `allocator` on release. Offsets are relative to the position the
 * read started at.
 */
export function loadWaveStream(
  source: ByteSource,
  byteLength: number,
  allocator: Allocator,
  options: ParseOptions = {}
): WaveResult<OwnedWave> {
  return loadFrom(source, byteLength, allocator, new ErrorFactory('stream'), options);
}

/**
 * Loads the whole file at `path`. The file is always closed before returning.
 */
export function loadWavePath(path: string, allocator: Allocator, options: ParseOptions = {}): WaveResult<OwnedWave> {
  const errors = new ErrorFactory(path);
  const opened = openFileSource(path, errors);
  if (!opened.ok) return opened;

  const { source, length } = opened.value;
  try {
    return loadFrom(source, length, allocator, errors, options);
  } finally {
    source.close();
  }
}
