import { CHUNK_HEADER_SIZE, DATA_CHUNK, FMT_CHUNK, FORMAT_PAYLOAD_SIZE, RIFF_HEADER_SIZE } from './constants';
import { type Allocator, allocateBlock } from './buffer/allocators';
import { type ByteSource, readExactly, seekTo } from './buffer/ByteSource';
import { openFileSource } from './buffer/FileSource';
import { ChunkCursor, StreamChunkSource, walkChunks } from './core/ChunkCursor';
import { ErrorFactory, failure, ok } from './core/ErrorFactory';
import { type WaveHandle, WaveInfo } from './core/WaveHandle';
import { createWalkState, resolveWalk } from './core/walkState';
import { describeContainerProblem } from './format-validation';
import { decodeFormat, readRiffHeader, writeChunkHeader } from './utils/records';
import { type ParseOptions, type ParsedWave, WaveErrorKind, type WaveResult } from './types';

type Allocate = (size: number) => WaveResult<Uint8Array>;

function readInfo(
  source: ByteSource,
  byteLength: number,
  allocate: Allocate,
  errors: ErrorFactory,
  options: ParseOptions
): WaveResult<ParsedWave> {
  const start = source.position;
  if (byteLength < RIFF_HEADER_SIZE) {
    return errors.fail(
      WaveErrorKind.MalformedContainer,
      `File is too small to be a valid WAVE (expected at least ${RIFF_HEADER_SIZE} bytes, got ${byteLength})`,
      start
    );
  }

  const headerBlock = allocate(RIFF_HEADER_SIZE);
  if (!headerBlock.ok) return headerBlock;
  const headerBytes = headerBlock.value.subarray(0, RIFF_HEADER_SIZE);

  const headerError = readExactly(source, headerBytes, errors);
  if (headerError) return failure(headerError);

  // Reject before touching anything past the header.
  const header = readRiffHeader(headerBytes);
  const containerProblem = describeContainerProblem(header);
  if (containerProblem) {
    return errors.fail(WaveErrorKind.MalformedContainer, containerProblem, start);
  }

  // Bytes past the size declared in the header, such as an appended tag, are not walked.
  const available = start + byteLength;
  const end = Math.min(available, start + RIFF_HEADER_SIZE + header.size - 4);
  const cursor = new ChunkCursor(
    new StreamChunkSource(source, available, errors),
    start + RIFF_HEADER_SIZE,
    end,
    errors,
    options
  );
  const state = createWalkState();

  // The cursor leaves the stream at the payload of the chunk it yields.
  const error = walkChunks(cursor, {
    [FMT_CHUNK]: (chunk) => {
      if (chunk.size < FORMAT_PAYLOAD_SIZE) {
        return errors.create(
          WaveErrorKind.MalformedContainer,
          `"fmt " chunk is too small (expected at least ${FORMAT_PAYLOAD_SIZE} bytes, got ${chunk.size})`,
          chunk.offset
        );
      }

      const block = allocate(CHUNK_HEADER_SIZE + chunk.size);
      if (!block.ok) return block.error;
      const chunkBytes = block.value.subarray(0, CHUNK_HEADER_SIZE + chunk.size);
      writeChunkHeader(chunkBytes, chunk);

      const payload = chunkBytes.subarray(CHUNK_HEADER_SIZE);
      const payloadError = readExactly(source, payload, errors);
      if (payloadError) return payloadError;

      state.formatChunk = chunk;
      state.formatBytes = payload;
      state.format = decodeFormat(payload);
      return null;
    },
    [DATA_CHUNK]: (chunk) => {
      const block = allocate(CHUNK_HEADER_SIZE);
      if (!block.ok) return block.error;
      const chunkBytes = block.value.subarray(0, CHUNK_HEADER_SIZE);
      writeChunkHeader(chunkBytes, chunk);

      state.dataChunk = chunk;
      state.dataChunkBytes = chunkBytes;
      state.sampleRegion = { offset: source.position, size: chunk.size };
      return null;
    },
  });
  if (error) return failure(error);

  return resolveWalk(header, headerBytes, state, errors);
}

function loadInfoFrom(
  source: ByteSource,
  byteLength: number,
  allocator: Allocator,
  errors: ErrorFactory,
  options: ParseOptions
): WaveResult<WaveInfo> {
  const blocks: Uint8Array[] = [];
  const allocate: Allocate = (size) => {
    const block = allocateBlock(allocator, size, errors);
    if (block.ok) blocks.push(block.value);
    return block;
  };

  const parsed = readInfo(source, byteLength, allocate, errors, options);
  if (!parsed.ok) {
    for (const block of blocks) allocator.release(block);
    return parsed;
  }
  return ok(new WaveInfo(parsed.value, blocks, allocator));
}

/**
 * Resolves the metadata of the WAVE file starting at the current position of
 * `source` without reading the sample payload.
 *
 * Only the container header and the `fmt ` and `data` chunk headers (plus
 * the `fmt ` payload) are copied, into small blocks from `allocator`. Other
 * chunks and the samples are skipped with seeks. Offsets are absolute source
 * positions, so `sampleRegion` can later be read directly with
 * {@link readSampleData}.
 */
export function loadWaveInfoStream(
  source: ByteSource,
  byteLength: number,
  allocator: Allocator,
  options: ParseOptions = {}
): WaveResult<WaveInfo> {
  return loadInfoFrom(source, byteLength, allocator, new ErrorFactory('stream'), options);
}

export function loadWaveInfoPath(path: string, allocator: Allocator, options: ParseOptions = {}): WaveResult<WaveInfo> {
  const errors = new ErrorFactory(path);
  const opened = openFileSource(path, errors);
  if (!opened.ok) return opened;

  const { source, length } = opened.value;
  try {
    return loadInfoFrom(source, length, allocator, errors, options);
  } finally {
    source.close();
  }
}

/**
 * Fills `target` with sample bytes read straight from `source`, starting
 * `start` bytes into the sample region of `wave`.
 */
export function readSampleData(
  source: ByteSource,
  wave: WaveHandle,
  target: Uint8Array,
  start = 0
): WaveResult<Uint8Array> {
  const errors = new ErrorFactory('stream');
  const region = wave.sampleRegion;
  if (!region) {
    return errors.fail(WaveErrorKind.MissingDataChunk, 'No "data" chunk was located');
  }

  if (start < 0 || start + target.length > region.size) {
    return errors.fail(
      WaveErrorKind.RangeOutOfBounds,
      `Range of ${target.length} bytes at ${start} lies outside the ${region.size}-byte sample region`,
      region.offset
    );
  }

  const error = seekTo(source, region.offset + start, errors) ?? readExactly(source, target, errors);
  if (error) return failure(error);
  return ok(target);
}
