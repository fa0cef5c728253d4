import { DATA_CHUNK, FMT_CHUNK, FORMAT_PAYLOAD_SIZE, RIFF_HEADER_SIZE } from './constants';
import { BufferChunkSource, ChunkCursor, walkChunks } from './core/ChunkCursor';
import { ErrorFactory, failure, ok } from './core/ErrorFactory';
import { BorrowedWave } from './core/WaveHandle';
import { createWalkState, resolveWalk } from './core/walkState';
import { describeContainerProblem } from './format-validation';
import { decodeFormat, readRiffHeader } from './utils/records';
import { type ParseOptions, type ParsedWave, WaveErrorKind, type WaveResult } from './types';

/**
 * Parses a complete WAVE file held in `buffer`. Shared by the buffer entry
 * point and the full stream loader.
 */
export function decodeWaveBuffer(
  buffer: Uint8Array,
  errors: ErrorFactory,
  options: ParseOptions = {}
): WaveResult<ParsedWave> {
  if (buffer.length === 0) {
    return errors.fail(WaveErrorKind.MalformedContainer, 'Buffer is empty');
  }
  if (buffer.length < RIFF_HEADER_SIZE) {
    return errors.fail(
      WaveErrorKind.MalformedContainer,
      `File is too small to be a valid WAVE (expected at least ${RIFF_HEADER_SIZE} bytes, got ${buffer.length})`
    );
  }

  const header = readRiffHeader(buffer);
  const containerProblem = describeContainerProblem(header);
  if (containerProblem) {
    return errors.fail(WaveErrorKind.MalformedContainer, containerProblem);
  }

  // The size field counts everything after itself, the form type included.
  const end = RIFF_HEADER_SIZE + header.size - 4;
  const cursor = new ChunkCursor(new BufferChunkSource(buffer), RIFF_HEADER_SIZE, end, errors, options);
  const state = createWalkState();

  const error = walkChunks(cursor, {
    [FMT_CHUNK]: (chunk) => {
      if (chunk.size < FORMAT_PAYLOAD_SIZE) {
        return errors.create(
          WaveErrorKind.MalformedContainer,
          `"fmt " chunk is too small (expected at least ${FORMAT_PAYLOAD_SIZE} bytes, got ${chunk.size})`,
          chunk.offset
        );
      }
      state.formatChunk = chunk;
      state.formatBytes = buffer.subarray(chunk.payloadOffset, chunk.payloadOffset + chunk.size);
      state.format = decodeFormat(state.formatBytes);
      return null;
    },
    [DATA_CHUNK]: (chunk) => {
      state.dataChunk = chunk;
      state.dataChunkBytes = buffer.subarray(chunk.offset, chunk.payloadOffset);
      state.sampleRegion = { offset: chunk.payloadOffset, size: chunk.size };
      state.samples = buffer.subarray(chunk.payloadOffset, chunk.payloadOffset + chunk.size);
      return null;
    },
  });
  if (error) return failure(error);

  return resolveWalk(header, buffer.subarray(0, RIFF_HEADER_SIZE), state, errors);
}

/**
 * Parses a WAVE file held entirely in memory.
 *
 * Nothing is copied or allocated: the returned handle's byte views alias
 * `buffer`, so the buffer must outlive the handle. A file without a `data`
 * chunk still parses; its sample queries then report zero.
 */
export function parseWaveBuffer(buffer: Uint8Array, options: ParseOptions = {}): WaveResult<BorrowedWave> {
  const parsed = decodeWaveBuffer(buffer, new ErrorFactory('buffer'), options);
  if (!parsed.ok) return parsed;
  return ok(new BorrowedWave(buffer, parsed.value));
}
