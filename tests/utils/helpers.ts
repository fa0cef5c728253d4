import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { MemorySource, type Allocator, type WaveFormat } from '../../src';

export interface TestChunk {
  id: string;
  /** Declared size; defaults to `data.length`. */
  size?: number;
  data?: Uint8Array;
}

export function findStringInUint8Array(haystack: Uint8Array, needle: string): number {
  const needleBytes = new TextEncoder().encode(needle);
  for (let i = 0; i <= haystack.length - needleBytes.length; i++) {
    let found = true;
    for (let j = 0; j < needleBytes.length; j++) {
      if (haystack[i + j] !== needleBytes[j]) {
        found = false;
        break;
      }
    }
    if (found) return i;
  }
  return -1;
}

function writeFourCC(buffer: Uint8Array, offset: number, id: string): void {
  for (let i = 0; i < 4; i++) buffer[offset + i] = id.charCodeAt(i);
}

/**
 * Serializes a RIFF container. Odd payloads get a zero pad byte unless `pad` is false;
 * `trailing` appends that many zero bytes after the last chunk.
 */
export function createWaveBuffer(opts: {
  chunks: TestChunk[];
  riffId?: string;
  formType?: string;
  riffSize?: number;
  pad?: boolean;
  trailing?: number;
}): Uint8Array {
  const pad = opts.pad ?? true;
  const padOf = (length: number) => (pad && length % 2 === 1 ? 1 : 0);

  let total = 12;
  for (const chunk of opts.chunks) {
    const length = chunk.data?.length ?? 0;
    total += 8 + length + padOf(length);
  }
  total += opts.trailing ?? 0;

  const buffer = new Uint8Array(total);
  const view = new DataView(buffer.buffer);
  writeFourCC(buffer, 0, opts.riffId ?? 'RIFF');
  view.setUint32(4, opts.riffSize ?? total - 8, true);
  writeFourCC(buffer, 8, opts.formType ?? 'WAVE');

  let offset = 12;
  for (const chunk of opts.chunks) {
    const data = chunk.data ?? new Uint8Array(0);
    writeFourCC(buffer, offset, chunk.id);
    view.setUint32(offset + 4, chunk.size ?? data.length, true);
    buffer.set(data, offset + 8);
    offset += 8 + data.length + padOf(data.length);
  }
  return buffer;
}

/**
 * A `fmt ` chunk; defaults to mono 8 kHz 16-bit PCM with consistent block align and byte rate.
 */
export function fmtChunk(format: Partial<WaveFormat> = {}, payloadSize = 16): TestChunk {
  const formatTag = format.formatTag ?? 1;
  const channels = format.channels ?? 1;
  const sampleRate = format.sampleRate ?? 8000;
  const bitsPerSample = format.bitsPerSample ?? 16;
  const blockAlign = format.blockAlign ?? (channels * bitsPerSample) / 8;
  const avgBytesPerSec = format.avgBytesPerSec ?? sampleRate * blockAlign;

  const data = new Uint8Array(Math.max(payloadSize, 16));
  const view = new DataView(data.buffer);
  view.setUint16(0, formatTag, true);
  view.setUint16(2, channels, true);
  view.setUint32(4, sampleRate, true);
  view.setUint32(8, avgBytesPerSec, true);
  view.setUint16(12, blockAlign, true);
  view.setUint16(14, bitsPerSample, true);
  return { id: 'fmt ', data: data.subarray(0, payloadSize) };
}

export function dataChunk(bytes: ArrayLike<number>): TestChunk {
  return { id: 'data', data: Uint8Array.from(bytes) };
}

export function sequence(length: number, start = 1): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (start + i) & 0xff);
}

/**
 * An allocator whose calls are recorded, handing out plain heap blocks.
 */
export function createSpyAllocator() {
  return {
    allocate: vi.fn((size: number) => new Uint8Array(size)),
    release: vi.fn((_block: Uint8Array) => {}),
  } satisfies Allocator;
}

/**
 * A MemorySource that counts the bytes handed out by `read`.
 */
export class CountingSource extends MemorySource {
  public bytesRead = 0;

  public override read(target: Uint8Array): number {
    const count = super.read(target);
    this.bytesRead += count;
    return count;
  }
}

export function createTempDir(): { dir: string; write: (name: string, bytes: Uint8Array) => string; remove: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'wave-chunk-reader-'));
  return {
    dir,
    write(name, bytes) {
      const path = join(dir, name);
      writeFileSync(path, bytes);
      return path;
    },
    remove() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
