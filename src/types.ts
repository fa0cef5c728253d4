/**
 * The number of bits of information in each audio sample.
 * Supported values are 8, 16 and 32 for PCM and 32 and 64 for IEEE float.
 */
export type WavBitDepth = 8 | 16 | 32 | 64 | (number & {});

/**
 * Identifier for the audio encoding format in a WAVE file header.
 * - `1`: PCM (uncompressed)
 * - `3`: IEEE Float
 */
export type WavFormatTag = 1 | 3 | (number & {});

/**
 * The number of audio samples per second (in Hertz).
 * Common values include 8000, 11025, 22050, 44100, and 48000.
 */
export type WavSampleRate =
  | 8000
  | 11025
  | 16000
  | 22050
  | 32000
  | 44100
  | 48000
  | 88200
  | 96000
  | 176400
  | 192000
  | (number & {});

/**
 * The 12-byte record that opens a RIFF container.
 * @property riffId - The container tag, `"RIFF"` for a valid file.
 * @property size - Byte count of everything following the size field.
 * @property formType - The form type, `"WAVE"` for a valid file.
 */
export interface RiffHeader {
  riffId: string;
  size: number;
  formType: string;
}

/**
 * A chunk located by the chunk cursor.
 * @property id - The four-character code of the chunk (e.g. `'fmt '`, `'data'`).
 * @property size - Declared payload size in bytes, excluding the 8-byte header and any pad byte.
 * @property offset - Absolute byte position of the chunk header.
 * @property payloadOffset - Absolute byte position of the first payload byte (`offset + 8`).
 */
export interface RiffChunk {
  id: string;
  size: number;
  offset: number;
  payloadOffset: number;
}

/**
 * Describes the format of a WAVE file, parsed from the first 16 bytes of the `fmt ` chunk.
 * @property formatTag - The numeric code for the audio encoding (PCM or IEEE float).
 * @property channels - The number of interleaved audio channels.
 * @property sampleRate - Samples per second per channel.
 * @property avgBytesPerSec - The average byte rate of the audio stream.
 * @property blockAlign - The size in bytes of one sample frame across all channels.
 * @property bitsPerSample - The number of bits per sample.
 */
export interface WaveFormat {
  formatTag: WavFormatTag;
  channels: number;
  sampleRate: WavSampleRate;
  avgBytesPerSec: number;
  blockAlign: number;
  bitsPerSample: WavBitDepth;
}

/**
 * Location of the raw sample payload.
 * @property offset - Byte position of the first sample byte in the source buffer or file.
 * @property size - Length of the payload in bytes.
 */
export interface SampleRegion {
  offset: number;
  size: number;
}

/**
 * Everything a successful parse resolves, independent of who owns the bytes.
 * The byte views alias either the caller's buffer or blocks owned by a handle.
 */
export interface ParsedWave {
  header: RiffHeader;
  headerBytes: Uint8Array;
  formatChunk: RiffChunk;
  format: WaveFormat;
  formatBytes: Uint8Array;
  dataChunk: RiffChunk | null;
  dataChunkBytes: Uint8Array | null;
  sampleRegion: SampleRegion | null;
  samples: Uint8Array | null;
}

/**
 * Decoded representation of the stored samples.
 */
export enum WaveSampleFormat {
  UNKNOWN,
  U8,
  S16,
  S32,
  F32,
  F64,
}

export const WaveSampleFormatNames = {
  [WaveSampleFormat.UNKNOWN]: 'unknown',
  [WaveSampleFormat.U8]: 'unsigned 8-bit',
  [WaveSampleFormat.S16]: 'signed 16-bit',
  [WaveSampleFormat.S32]: 'signed 32-bit',
  [WaveSampleFormat.F32]: 'float 32-bit',
  [WaveSampleFormat.F64]: 'float 64-bit',
} as const;

/**
 * The reason a parse or load failed.
 */
export enum WaveErrorKind {
  MalformedContainer = 'MalformedContainer',
  UnsupportedFormat = 'UnsupportedFormat',
  MissingFormatChunk = 'MissingFormatChunk',
  MissingDataChunk = 'MissingDataChunk',
  RangeOutOfBounds = 'RangeOutOfBounds',
  IoFailure = 'IoFailure',
  AllocationFailure = 'AllocationFailure',
}

/**
 * Describes an error that stopped a parse or load.
 * @property kind - What went wrong.
 * @property message - A descriptive message explaining the error.
 * @property offset - The byte position the error refers to.
 * @property source - The path, or `"buffer"`/`"stream"`, that was being read.
 */
export interface WaveError {
  kind: WaveErrorKind;
  message: string;
  offset: number;
  source: string;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: WaveError;
}

export type WaveResult<T> = Success<T> | Failure;

/**
 * Options shared by every parse and load entry point.
 * @property maxChunks - Upper bound on the number of chunks visited before the container is rejected. Unlimited by default.
 */
export interface ParseOptions {
  maxChunks?: number;
}

/**
 * The sample payload as reported by `getSampleData`.
 * @property bytes - The payload itself, or `null` when the handle never held it or has released it.
 */
export interface SampleData {
  offset: number;
  size: number;
  bytes: Uint8Array | null;
}
