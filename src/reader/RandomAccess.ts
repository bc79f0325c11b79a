import { throwIfAborted } from '../abort.js';

/** Positional byte source. Reads never move shared state, so they may run concurrently. */
export interface RandomAccess {
  size(signal?: AbortSignal): Promise<bigint>;
  /** Up to `length` bytes at `offset`; fewer only at the end of the source. */
  read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array>;
  close(): Promise<void>;
}

export class BufferRandomAccess implements RandomAccess {
  constructor(private readonly data: Uint8Array) {}

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    return BigInt(this.data.length);
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    if (length <= 0 || offset >= BigInt(this.data.length)) return new Uint8Array(0);
    const start = Number(offset);
    return this.data.subarray(start, Math.min(this.data.length, start + length));
  }

  async close(): Promise<void> {
    return;
  }
}
