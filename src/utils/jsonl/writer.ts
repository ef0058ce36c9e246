import { createWriteStream, type WriteStream } from "fs";

/**
 * Append-only JSONL file. The file is opened on the first record; records
 * land in the order they were appended.
 */
export class JsonlFile {
  private stream: WriteStream | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly onWriteError: (error: unknown) => void
  ) {}

  append(record: unknown): void {
    const line = `${JSON.stringify(record)}\n`;
    this.queue = this.queue.then(() => this.writeLine(line)).catch(this.onWriteError);
  }

  /** Resolves once every appended record has been handed to the file. */
  drain(): Promise<void> {
    return this.queue;
  }

  async close(): Promise<void> {
    await this.queue;
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private writeLine(line: string): Promise<void> {
    if (!this.stream) this.stream = createWriteStream(this.path, { flags: "a" });
    const stream = this.stream;
    return new Promise((resolve, reject) => {
      stream.write(line, (error) => (error ? reject(error) : resolve()));
    });
  }
}
