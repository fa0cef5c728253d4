import type { Allocator } from '../buffer/allocators';
import type { ParsedWave, RiffChunk, RiffHeader, SampleRegion, WaveFormat } from '../types';

interface WaveViews {
  headerBytes: Uint8Array;
  formatBytes: Uint8Array;
  dataChunkBytes: Uint8Array | null;
  samples: Uint8Array | null;
}

abstract class WaveBase {
  public readonly header: RiffHeader;
  public readonly formatChunk: RiffChunk;
  public readonly format: WaveFormat;
  public readonly dataChunk: RiffChunk | null;
  public readonly sampleRegion: SampleRegion | null;

  protected constructor(parsed: ParsedWave) {
    this.header = parsed.header;
    this.formatChunk = parsed.formatChunk;
    this.format = parsed.format;
    this.dataChunk = parsed.dataChunk;
    this.sampleRegion = parsed.sampleRegion;
  }
}

/**
 * Result of parsing a caller-owned buffer. Every byte view aliases that
 * buffer, which must stay alive and unmodified for as long as the handle is used.
 */
export class BorrowedWave extends WaveBase {
  public readonly ownership = 'borrowed' as const;
  public readonly buffer: Uint8Array;
  public readonly headerBytes: Uint8Array;
  public readonly formatBytes: Uint8Array;
  public readonly dataChunkBytes: Uint8Array | null;
  public readonly samples: Uint8Array | null;
  public readonly released = false;

  constructor(buffer: Uint8Array, parsed: ParsedWave) {
    super(parsed);
    this.buffer = buffer;
    this.headerBytes = parsed.headerBytes;
    this.formatBytes = parsed.formatBytes;
    this.dataChunkBytes = parsed.dataChunkBytes;
    this.samples = parsed.samples;
  }

  /** The buffer belongs to the caller, so there is nothing to release. */
  public release(): void {}
}

abstract class OwningWave extends WaveBase {
  private readonly allocator: Allocator;
  private blocks: Uint8Array[] | null;
  private views: WaveViews | null;

  protected constructor(parsed: ParsedWave, blocks: Uint8Array[], allocator: Allocator) {
    super(parsed);
    this.allocator = allocator;
    this.blocks = blocks;
    this.views = {
      headerBytes: parsed.headerBytes,
      formatBytes: parsed.formatBytes,
      dataChunkBytes: parsed.dataChunkBytes,
      samples: parsed.samples,
    };
  }

  public get released(): boolean {
    return this.blocks === null;
  }

  public get headerBytes(): Uint8Array | null {
    return this.views?.headerBytes ?? null;
  }

  public get formatBytes(): Uint8Array | null {
    return this.views?.formatBytes ?? null;
  }

  public get dataChunkBytes(): Uint8Array | null {
    return this.views?.dataChunkBytes ?? null;
  }

  public get samples(): Uint8Array | null {
    return this.views?.samples ?? null;
  }

  /**
   * Returns every owned block to the allocator that produced it. The byte
   * views read as `null` afterwards; decoded metadata stays available.
   * Releasing twice is a no-op.
   */
  public release(): void {
    const blocks = this.blocks;
    if (!blocks) return;
    this.blocks = null;
    this.views = null;
    for (const block of blocks) this.allocator.release(block);
  }
}

/**
 * Result of a full stream load. Owns one allocation holding the whole file.
 */
export class OwnedWave extends OwningWave {
  public readonly ownership = 'owned' as const;

  constructor(parsed: ParsedWave, allocation: Uint8Array, allocator: Allocator) {
    super(parsed, [allocation], allocator);
  }
}

/**
 * Result of a metadata-only load. Owns copies of the container header and the
 * `fmt ` and `data` chunk headers; the sample payload is only referenced by
 * `sampleRegion` and never read.
 */
export class WaveInfo extends OwningWave {
  public readonly ownership = 'metadata' as const;

  constructor(parsed: ParsedWave, blocks: Uint8Array[], allocator: Allocator) {
    super(parsed, blocks, allocator);
  }
}

export type WaveHandle = BorrowedWave | OwnedWave | WaveInfo;

export type WaveOwnership = WaveHandle['ownership'];

/**
 * Releases whatever `wave` owns. Safe to call on `null`, borrowed handles, and already released handles.
 */
export function releaseWave(wave: WaveHandle | null | undefined): void {
  wave?.release();
}
