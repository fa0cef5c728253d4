import { type ErrorFactory, failure, ok } from '../core/ErrorFactory';
import { WaveErrorKind, type WaveResult } from '../types';

/**
 * Strategy the loaders use to obtain memory.
 *
 * A block handed out by `allocate` is given back to `release` of the same
 * allocator exactly once, by the handle that owns it.
 */
export interface Allocator {
  allocate(size: number): Uint8Array;
  release(block: Uint8Array): void;
}

/**
 * Plain garbage-collected allocation. `release` has nothing to do.
 */
export const heapAllocator: Allocator = {
  allocate(size: number): Uint8Array {
    return new Uint8Array(size);
  },
  release(): void {},
};

/**
 * Requests `size` bytes from `allocator`, reporting throws and short blocks as `AllocationFailure`.
 * The block may be longer than requested; callers work on a `subarray` and release the block itself.
 */
export function allocateBlock(allocator: Allocator, size: number, errors: ErrorFactory): WaveResult<Uint8Array> {
  let block: Uint8Array;
  try {
    block = allocator.allocate(size);
  } catch (error) {
    return failure(errors.fromException(WaveErrorKind.AllocationFailure, error));
  }

  if (block.length < size) {
    allocator.release(block);
    return errors.fail(
      WaveErrorKind.AllocationFailure,
      `Allocator returned ${block.length} bytes, ${size} were requested`
    );
  }
  return ok(block);
}
