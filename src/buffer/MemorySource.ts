import { type ByteSource, SeekOrigin } from './ByteSource';

/**
 * A ByteSource over bytes already in memory.
 */
export class MemorySource implements ByteSource {
  private readonly bytes: Uint8Array;
  private _position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  public get position(): number {
    return this._position;
  }

  public get length(): number {
    return this.bytes.length;
  }

  public read(target: Uint8Array): number {
    const available = Math.max(0, this.bytes.length - this._position);
    const count = Math.min(available, target.length);
    if (count === 0) return 0;
    target.set(this.bytes.subarray(this._position, this._position + count));
    this._position += count;
    return count;
  }

  public seek(offset: number, origin: SeekOrigin = SeekOrigin.Start): void {
    const base = origin === SeekOrigin.Start ? 0 : origin === SeekOrigin.Current ? this._position : this.bytes.length;
    const next = base + offset;
    if (next < 0) throw new RangeError(`Cannot seek before the start of the source (${next})`);
    this._position = next;
  }
}
