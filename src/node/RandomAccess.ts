import { open, type FileHandle } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { throwIfAborted } from '../abort.js';
import type { RandomAccess } from '../reader/RandomAccess.js';

/** Archive file read through positional reads on one open handle. */
export class FileRandomAccess implements RandomAccess {
  private constructor(
    private readonly handle: FileHandle,
    private readonly byteLength: bigint
  ) {}

  /** Open `path` and record its size; the archive is assumed not to change while it is open. */
  static async open(path: string | URL): Promise<FileRandomAccess> {
    const handle = await open(typeof path === 'string' ? path : fileURLToPath(path), 'r');
    try {
      const stat = await handle.stat({ bigint: true });
      return new FileRandomAccess(handle, stat.size);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    return this.byteLength;
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    if (length <= 0 || offset >= this.byteLength) return new Uint8Array(0);
    const buffer = new Uint8Array(Math.min(length, Number(this.byteLength - offset)));
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, Number(offset));
    throwIfAborted(signal);
    return bytesRead === buffer.length ? buffer : buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
