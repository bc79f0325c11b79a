import { open, rm, type FileHandle } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Sink } from '../writer/Sink.js';

/**
 * Archive file on disk. The file is opened by {@link FileSink.create}, so a
 * path that cannot be written fails before any file is added.
 */
export class FileSink implements Sink {
  position: bigint = 0n;

  private constructor(
    private readonly path: string,
    private readonly handle: FileHandle
  ) {}

  static async create(path: string | URL): Promise<FileSink> {
    const filePath = typeof path === 'string' ? path : fileURLToPath(path);
    return new FileSink(filePath, await open(filePath, 'w'));
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.handle.write(chunk, 0, chunk.length, Number(this.position));
    this.position += BigInt(chunk.length);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  /** Close the handle and remove the partly written archive. */
  async abort(): Promise<void> {
    await this.handle.close();
    await rm(this.path, { force: true });
  }
}
