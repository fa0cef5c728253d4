import { describeFormatProblem } from '../format-validation';
import {
  type ParsedWave,
  type RiffChunk,
  type RiffHeader,
  type SampleRegion,
  WaveErrorKind,
  type WaveFormat,
  type WaveResult,
} from '../types';
import { type ErrorFactory, ok } from './ErrorFactory';

/**
 * What the chunk handlers have found so far. Later chunks with the same tag replace earlier ones.
 */
export interface WalkState {
  formatChunk: RiffChunk | null;
  format: WaveFormat | null;
  formatBytes: Uint8Array | null;
  dataChunk: RiffChunk | null;
  dataChunkBytes: Uint8Array | null;
  sampleRegion: SampleRegion | null;
  samples: Uint8Array | null;
}

export function createWalkState(): WalkState {
  return {
    formatChunk: null,
    format: null,
    formatBytes: null,
    dataChunk: null,
    dataChunkBytes: null,
    sampleRegion: null,
    samples: null,
  };
}

/**
 * Checks that a usable format was found and assembles the parse result.
 */
export function resolveWalk(
  header: RiffHeader,
  headerBytes: Uint8Array,
  state: WalkState,
  errors: ErrorFactory
): WaveResult<ParsedWave> {
  const { formatChunk, format, formatBytes } = state;
  if (!formatChunk || !format || !formatBytes) {
    return errors.fail(WaveErrorKind.MissingFormatChunk, 'Missing required "fmt " chunk');
  }

  const problem = describeFormatProblem(format);
  if (problem) {
    return errors.fail(WaveErrorKind.UnsupportedFormat, problem, formatChunk.payloadOffset);
  }

  return ok({
    header,
    headerBytes,
    formatChunk,
    format,
    formatBytes,
    dataChunk: state.dataChunk,
    dataChunkBytes: state.dataChunkBytes,
    sampleRegion: state.sampleRegion,
    samples: state.samples,
  });
}
