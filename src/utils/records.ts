import type { RiffChunk, RiffHeader, WaveFormat } from '../types';

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function readFourCC(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + 4));
}

/**
 * Reads the 12-byte container header at the start of `bytes`.
 */
export function readRiffHeader(bytes: Uint8Array): RiffHeader {
  return {
    riffId: readFourCC(bytes, 0),
    size: viewOf(bytes).getUint32(4, true),
    formType: readFourCC(bytes, 8),
  };
}

export function readChunkHeader(bytes: Uint8Array, offset: number): { id: string; size: number } {
  return {
    id: readFourCC(bytes, offset),
    size: viewOf(bytes).getUint32(offset + 4, true),
  };
}

/**
 * Writes the 8-byte header of `chunk` to the start of `target`.
 */
export function writeChunkHeader(target: Uint8Array, chunk: RiffChunk): void {
  for (let i = 0; i < 4; i++) target[i] = chunk.id.charCodeAt(i);
  viewOf(target).setUint32(4, chunk.size, true);
}

/**
 * Decodes the fixed part of a `fmt ` payload. `payload` must hold at least 16 bytes.
 */
export function decodeFormat(payload: Uint8Array): WaveFormat {
  const view = viewOf(payload);
  return {
    formatTag: view.getUint16(0, true),
    channels: view.getUint16(2, true),
    sampleRate: view.getUint32(4, true),
    avgBytesPerSec: view.getUint32(8, true),
    blockAlign: view.getUint16(12, true),
    bitsPerSample: view.getUint16(14, true),
  };
}
