import { RIFF_ID, WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM, WAVE_ID } from './constants';
import type { RiffHeader, WaveFormat } from './types';

/**
 * A set of supported audio format tags.
 *
 * Only uncompressed encodings are accepted. The values correspond to the
 * `wFormatTag` field in a WAVE file's format chunk.
 *
 * @type {Set<number>}
 */
export const SUPPORTED_FORMATS: Set<number> = new Set([WAVE_FORMAT_PCM, WAVE_FORMAT_IEEE_FLOAT]);

/**
 * A map that specifies the valid bit depths for each supported audio format.
 *
 * For example, `VALID_BIT_DEPTHS.get(WAVE_FORMAT_PCM)` returns `[8, 16, 32]`.
 *
 * @type {Map<number, number[]>}
 */
export const VALID_BIT_DEPTHS: Map<number, number[]> = new Map([
  [WAVE_FORMAT_PCM, [8, 16, 32]],
  [WAVE_FORMAT_IEEE_FLOAT, [32, 64]],
]);

const FORMAT_NAMES: Map<number, string> = new Map([
  [WAVE_FORMAT_PCM, 'PCM'],
  [WAVE_FORMAT_IEEE_FLOAT, 'IEEE Float'],
]);

function hex16(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}

export function validateContainer(header: RiffHeader): boolean {
  return header.riffId === RIFF_ID && header.formType === WAVE_ID;
}

export function describeContainerProblem(header: RiffHeader): string | null {
  if (header.riffId !== RIFF_ID) return 'Missing RIFF signature at byte 0';
  if (header.formType !== WAVE_ID) return 'Missing "WAVE" signature at byte 8';
  return null;
}

/**
 * Explains why `format` cannot be decoded, or returns `null` when it can.
 */
export function describeFormatProblem(format: WaveFormat | null): string | null {
  if (!format) return 'Missing required "fmt " chunk';

  if (!SUPPORTED_FORMATS.has(format.formatTag)) {
    return `Unsupported audio format tag ${hex16(format.formatTag)}`;
  }

  const depths = VALID_BIT_DEPTHS.get(format.formatTag) ?? [];
  if (!depths.includes(format.bitsPerSample)) {
    const name = FORMAT_NAMES.get(format.formatTag) ?? hex16(format.formatTag);
    return `Unsupported bit depth for ${name}: ${format.bitsPerSample} (expected one of ${depths.join(', ')})`;
  }

  return null;
}

export function validateFormat(format: WaveFormat | null): boolean {
  return describeFormatProblem(format) === null;
}
