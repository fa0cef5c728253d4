import { describe, expect, it } from 'vitest';
import {
  describeContainerProblem,
  describeFormatProblem,
  SUPPORTED_FORMATS,
  VALID_BIT_DEPTHS,
  validateContainer,
  validateFormat,
} from '../src/format-validation';
import { WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from '../src/constants';
import type { WaveFormat } from '../src/types';

function format(formatTag: number, bitsPerSample: number): WaveFormat {
  return { formatTag, channels: 1, sampleRate: 8000, avgBytesPerSec: 0, blockAlign: 0, bitsPerSample };
}

describe('format validation', () => {
  it('accepts only uncompressed encodings', () => {
    expect([...SUPPORTED_FORMATS]).toEqual([WAVE_FORMAT_PCM, WAVE_FORMAT_IEEE_FLOAT]);
    expect(VALID_BIT_DEPTHS.get(WAVE_FORMAT_PCM)).toEqual([8, 16, 32]);
    expect(VALID_BIT_DEPTHS.get(WAVE_FORMAT_IEEE_FLOAT)).toEqual([32, 64]);
  });

  it.each([
    [WAVE_FORMAT_PCM, 8],
    [WAVE_FORMAT_PCM, 16],
    [WAVE_FORMAT_PCM, 32],
    [WAVE_FORMAT_IEEE_FLOAT, 32],
    [WAVE_FORMAT_IEEE_FLOAT, 64],
  ])('accepts format 0x%i at %i bits', (tag, bits) => {
    expect(validateFormat(format(tag, bits))).toBe(true);
    expect(describeFormatProblem(format(tag, bits))).toBeNull();
  });

  it('reports a missing format', () => {
    expect(validateFormat(null)).toBe(false);
    expect(describeFormatProblem(null)).toBe('Missing required "fmt " chunk');
  });

  it('reports unknown format tags in hex', () => {
    expect(describeFormatProblem(format(0x0002, 16))).toBe('Unsupported audio format tag 0x0002');
    expect(describeFormatProblem(format(0xfffe, 16))).toBe('Unsupported audio format tag 0xfffe');
  });

  it('reports bit depths the encoding does not allow', () => {
    expect(describeFormatProblem(format(WAVE_FORMAT_PCM, 24))).toBe(
      'Unsupported bit depth for PCM: 24 (expected one of 8, 16, 32)'
    );
    expect(describeFormatProblem(format(WAVE_FORMAT_IEEE_FLOAT, 16))).toBe(
      'Unsupported bit depth for IEEE Float: 16 (expected one of 32, 64)'
    );
    expect(validateFormat(format(WAVE_FORMAT_PCM, 64))).toBe(false);
  });

  it('checks both container signatures', () => {
    expect(validateContainer({ riffId: 'RIFF', size: 4, formType: 'WAVE' })).toBe(true);
    expect(describeContainerProblem({ riffId: 'RIFX', size: 4, formType: 'WAVE' })).toBe(
      'Missing RIFF signature at byte 0'
    );
    expect(describeContainerProblem({ riffId: 'RIFF', size: 4, formType: 'AVI ' })).toBe(
      'Missing "WAVE" signature at byte 8'
    );
    expect(validateContainer({ riffId: 'RIFF', size: 4, formType: 'AVI ' })).toBe(false);
  });
});
