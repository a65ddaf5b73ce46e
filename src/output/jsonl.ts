import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { Writable } from 'node:stream';

/** Writes one JSON document per line, to a file or to an already open stream such as stdout. */
export class JsonlStreamWriter {
  private written = 0;
  private failure: Error | null = null;

  private constructor(
    private readonly stream: Writable,
    private readonly destination: string | null,
  ) {
    stream.on('error', (error: Error) => {
      this.failure = this.failure ?? error;
    });
  }

  /** Rejects when the file cannot be opened for writing. */
  static async create(destination: string): Promise<JsonlStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    const writer = new JsonlStreamWriter(stream, destination);
    await once(stream, 'open');
    return writer;
  }

  /** The stream is not ended on close. */
  static fromStream(stream: Writable): JsonlStreamWriter {
    return new JsonlStreamWriter(stream, null);
  }

  async write(record: unknown): Promise<void> {
    const line = JSON.stringify(record);
    if (line === undefined) {
      throw new TypeError('Record cannot be serialized to JSON');
    }
    if (this.failure) {
      throw this.failure;
    }
    this.written += 1;
    if (!this.stream.write(`${line}\n`)) {
      // Rejects if the stream errors before draining.
      await once(this.stream, 'drain');
    }
  }

  async writeAll(records: Iterable<unknown>): Promise<void> {
    for (const record of records) {
      await this.write(record);
    }
  }

  async close(): Promise<void> {
    if (this.destination === null) {
      return;
    }
    this.stream.end();
    await finished(this.stream);
  }

  get count(): number {
    return this.written;
  }

  get path(): string | null {
    return this.destination;
  }
}
