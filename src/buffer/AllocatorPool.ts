import type { Allocator } from './allocators';

/**
 * Manages a pool of byte blocks to reuse memory across loads and reduce GC pressure.
 */
export class AllocatorPool implements Allocator {
  private pool: Uint8Array[] = [];
  private readonly issued = new Map<Uint8Array, Uint8Array>();
  private readonly minBlockSize: number;

  constructor(minBlockSize = 4096) {
    this.minBlockSize = minBlockSize;
  }

  /** Number of blocks handed out and not yet released. */
  public get outstanding(): number {
    return this.issued.size;
  }

  /** Number of released blocks waiting to be reused. */
  public get pooled(): number {
    return this.pool.length;
  }

  /**
   * Acquires a zeroed block of exactly `size` bytes, backed by a pooled block when one is large enough.
   */
  public allocate(size: number): Uint8Array {
    const index = this.pool.findIndex((candidate) => candidate.length >= size);
    const reused = index >= 0 ? this.pool.splice(index, 1)[0] : undefined;
    const backing = reused ?? new Uint8Array(Math.max(size, this.minBlockSize));
    const block = backing.subarray(0, size);
    block.fill(0);
    this.issued.set(block, backing);
    return block;
  }

  /**
   * Returns a block to the pool for later reuse.
   * @param block A view previously returned by {@link AllocatorPool.allocate}.
   */
  public release(block: Uint8Array): void {
    const backing = this.issued.get(block);
    if (!backing) {
      console.warn(`[AllocatorPool] Attempting to release an untracked block of ${block.length} bytes; ignored`);
      return;
    }
    this.issued.delete(block);
    this.pool.push(backing);
  }

  /**
   * Clears all blocks from the pool.
   */
  public clear(): void {
    this.pool.length = 0;
  }
}
