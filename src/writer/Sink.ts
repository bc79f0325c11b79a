/** Sequential byte destination for a finished archive. */
export interface Sink {
  /** Bytes written so far. */
  position: bigint;
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
  /** Discard the output after a failed write-out. Sinks without it are closed instead. */
  abort?(reason: unknown): Promise<void>;
}

export class WebWritableSink implements Sink {
  position: bigint = 0n;
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;

  constructor(stream: WritableStream<Uint8Array>) {
    this.writer = stream.getWriter();
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.writer.write(chunk);
    this.position += BigInt(chunk.length);
  }

  async close(): Promise<void> {
    await this.writer.close();
  }

  async abort(reason: unknown): Promise<void> {
    await this.writer.abort(reason);
  }
}
