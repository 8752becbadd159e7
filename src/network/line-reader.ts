/**
 * Accumulates socket chunks and hands them back one terminated line at a
 * time. Bytes after the first terminator stay buffered for the next read.
 */
export default class LineReader {
  private buffer: Buffer = Buffer.alloc(0);

  private readonly delimiter: Buffer;

  constructor(terminator: string) {
    this.delimiter = Buffer.from(terminator, 'utf8');
  }

  append(chunk: Buffer): void {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Text before the next terminator, without the terminator, or `undefined`
   * if no complete line is buffered yet.
   */
  readLine(): string | undefined {
    const index = this.buffer.indexOf(this.delimiter);
    if (index === -1) return undefined;

    const line = this.buffer.subarray(0, index).toString('utf8');
    this.buffer = this.buffer.subarray(index + this.delimiter.length);
    return line;
  }

  /**
   * Number of unread bytes currently buffered.
   */
  get available(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}
