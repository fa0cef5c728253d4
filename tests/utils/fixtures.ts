import { WaveFile } from 'wavefile';
import { WaveSampleFormat } from '../../src';

export interface FixtureProperties {
  bitDepthCode: string;
  channels: number;
  sampleRate: number;
  bitDepth: number;
  samplesPerChannel: number;
  formatTag: number;
  sampleFormat: WaveSampleFormat;
}

export const fixtureProperties: Record<string, FixtureProperties> = {
  'pcm_d8_mono.wav': {
    bitDepthCode: '8',
    channels: 1,
    sampleRate: 8000,
    bitDepth: 8,
    samplesPerChannel: 800,
    formatTag: 0x0001,
    sampleFormat: WaveSampleFormat.U8,
  },
  'pcm_d16_stereo.wav': {
    bitDepthCode: '16',
    channels: 2,
    sampleRate: 44100,
    bitDepth: 16,
    samplesPerChannel: 441,
    formatTag: 0x0001,
    sampleFormat: WaveSampleFormat.S16,
  },
  'pcm_d32_mono.wav': {
    bitDepthCode: '32',
    channels: 1,
    sampleRate: 48000,
    bitDepth: 32,
    samplesPerChannel: 480,
    formatTag: 0x0001,
    sampleFormat: WaveSampleFormat.S32,
  },
  'float_d32_stereo.wav': {
    bitDepthCode: '32f',
    channels: 2,
    sampleRate: 22050,
    bitDepth: 32,
    samplesPerChannel: 2205,
    formatTag: 0x0003,
    sampleFormat: WaveSampleFormat.F32,
  },
  'float_d64_mono.wav': {
    bitDepthCode: '64',
    channels: 1,
    sampleRate: 16000,
    bitDepth: 64,
    samplesPerChannel: 160,
    formatTag: 0x0003,
    sampleFormat: WaveSampleFormat.F64,
  },
};

function channelSamples(props: FixtureProperties, channel: number): number[] {
  const samples: number[] = [];
  for (let i = 0; i < props.samplesPerChannel; i++) {
    const phase = Math.sin((2 * Math.PI * (i + channel * 7)) / 32);
    if (props.bitDepthCode === '8') samples.push(128 + Math.round(phase * 100));
    else if (props.bitDepthCode === '16') samples.push(Math.round(phase * 20000));
    else if (props.bitDepthCode === '32') samples.push(Math.round(phase * 1_000_000_000));
    else samples.push(phase * 0.5);
  }
  return samples;
}

/**
 * Renders a fixture with wavefile, so the parser is checked against an independent writer.
 */
export function createFixture(name: string): Uint8Array {
  const props = fixtureProperties[name];
  if (!props) throw new Error(`Unknown fixture: ${name}`);

  const channels = Array.from({ length: props.channels }, (_, channel) => channelSamples(props, channel));
  const wav = new WaveFile();
  wav.fromScratch(
    props.channels,
    props.sampleRate,
    props.bitDepthCode,
    props.channels === 1 ? (channels[0] ?? []) : channels
  );
  return wav.toBuffer();
}
