export * from './constants';
export * from './types';
export { ErrorFactory } from './core/ErrorFactory';
export {
  BufferChunkSource,
  ChunkCursor,
  StreamChunkSource,
  walkChunks,
  type ChunkHandler,
  type ChunkHandlers,
  type ChunkSource,
} from './core/ChunkCursor';
export { BorrowedWave, OwnedWave, WaveInfo, releaseWave, type WaveHandle, type WaveOwnership } from './core/WaveHandle';
export { SUPPORTED_FORMATS, VALID_BIT_DEPTHS, validateContainer, validateFormat, describeFormatProblem } from './format-validation';
export { type Allocator, heapAllocator } from './buffer/allocators';
export { AllocatorPool } from './buffer/AllocatorPool';
export { type ByteSource, SeekOrigin } from './buffer/ByteSource';
export { MemorySource } from './buffer/MemorySource';
export { FileSource } from './buffer/FileSource';
export { parseWaveBuffer } from './parseWaveBuffer';
export { loadWavePath, loadWaveStream } from './loadWave';
export { loadWaveInfoPath, loadWaveInfoStream, readSampleData } from './loadWaveInfo';
export {
  describeWave,
  getBitsPerSample,
  getBytesPerSample,
  getChannelCount,
  getDuration,
  getFrameCount,
  getSampleCount,
  getSampleData,
  getSampleFormat,
  getSampleRate,
  type WaveSummary,
} from './metadata';
