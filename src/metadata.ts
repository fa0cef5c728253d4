import { WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from './constants';
import type { WaveHandle, WaveOwnership } from './core/WaveHandle';
import { type SampleData, WaveSampleFormat, WaveSampleFormatNames } from './types';

type MaybeWave = WaveHandle | null | undefined;

export function getSampleFormat(wave: MaybeWave): WaveSampleFormat {
  if (!wave) return WaveSampleFormat.UNKNOWN;
  const { formatTag, bitsPerSample } = wave.format;

  if (formatTag === WAVE_FORMAT_PCM) {
    if (bitsPerSample === 8) return WaveSampleFormat.U8;
    if (bitsPerSample === 16) return WaveSampleFormat.S16;
    if (bitsPerSample === 32) return WaveSampleFormat.S32;
  }

  if (formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    if (bitsPerSample === 32) return WaveSampleFormat.F32;
    if (bitsPerSample === 64) return WaveSampleFormat.F64;
  }

  return WaveSampleFormat.UNKNOWN;
}

export function getBitsPerSample(wave: MaybeWave): number {
  return wave ? wave.format.bitsPerSample : 0;
}

export function getBytesPerSample(wave: MaybeWave): number {
  return getBitsPerSample(wave) / 8;
}

export function getChannelCount(wave: MaybeWave): number {
  return wave ? wave.format.channels : 0;
}

export function getSampleRate(wave: MaybeWave): number {
  return wave ? wave.format.sampleRate : 0;
}

/**
 * Total number of samples in the data chunk, counted across all channels.
 */
export function getSampleCount(wave: MaybeWave): number {
  const bytesPerSample = getBytesPerSample(wave);
  if (!wave?.sampleRegion || bytesPerSample <= 0) return 0;
  return Math.floor(wave.sampleRegion.size / bytesPerSample);
}

/**
 * Number of sample frames, one sample per channel each.
 */
export function getFrameCount(wave: MaybeWave): number {
  const channels = getChannelCount(wave);
  if (channels === 0) return 0;
  return Math.floor(getSampleCount(wave) / channels);
}

/**
 * Playback length in seconds. The sample count covers every channel, so it is
 * divided by the channel count before the sample rate.
 */
export function getDuration(wave: MaybeWave): number {
  const channels = getChannelCount(wave);
  const sampleRate = getSampleRate(wave);
  if (channels === 0 || sampleRate === 0) return 0;
  return getSampleCount(wave) / channels / sampleRate;
}

/**
 * Where the samples live and, when the handle holds them, the bytes themselves.
 * @returns `null` when the file has no `data` chunk.
 */
export function getSampleData(wave: MaybeWave): SampleData | null {
  if (!wave?.sampleRegion) return null;
  return {
    offset: wave.sampleRegion.offset,
    size: wave.sampleRegion.size,
    bytes: wave.samples,
  };
}

export interface WaveSummary {
  ownership: WaveOwnership | null;
  sampleFormat: (typeof WaveSampleFormatNames)[WaveSampleFormat];
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  sampleCount: number;
  frameCount: number;
  duration: number;
  sampleDataOffset: number;
  sampleDataSize: number;
}

/**
 * Collects every query result into one plain object, e.g. for logging.
 */
export function describeWave(wave: MaybeWave): WaveSummary {
  return {
    ownership: wave ? wave.ownership : null,
    sampleFormat: WaveSampleFormatNames[getSampleFormat(wave)],
    channels: getChannelCount(wave),
    sampleRate: getSampleRate(wave),
    bitsPerSample: getBitsPerSample(wave),
    sampleCount: getSampleCount(wave),
    frameCount: getFrameCount(wave),
    duration: getDuration(wave),
    sampleDataOffset: wave?.sampleRegion?.offset ?? 0,
    sampleDataSize: wave?.sampleRegion?.size ?? 0,
  };
}
