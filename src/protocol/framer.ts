export type FramedChunk = {
  lines: string[];
  /** Lines longer than `maxLineLength` bytes that were discarded. */
  overflows: number;
};

const NEWLINE = 0x0a;

/**
 * Splits a byte stream into newline-terminated lines. Lines are decoded as
 * UTF-8 only once complete, so a character split across chunks survives. An
 * over-long line is dropped and the framer resyncs at the next newline.
 */
export class LineFramer {
  private readonly maxLineLength: number;
  private parts: Buffer[] = [];
  private size = 0;
  private discarding = false;

  constructor(maxLineLength: number) {
    this.maxLineLength = maxLineLength;
  }

  push(chunk: Buffer | string): FramedChunk {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    const lines: string[] = [];
    let overflows = 0;
    let start = 0;

    while (start <= bytes.length) {
      const newline = bytes.indexOf(NEWLINE, start);
      const segment = bytes.subarray(start, newline === -1 ? bytes.length : newline);

      if (this.discarding) {
        if (newline !== -1) {
          this.discarding = false;
        }
      } else if (this.size + segment.length > this.maxLineLength) {
        overflows += 1;
        this.reset();
        this.discarding = newline === -1;
      } else if (newline !== -1) {
        this.parts.push(segment);
        const line = Buffer.concat(this.parts, this.size + segment.length).toString('utf8');
        lines.push(line.replace(/\r$/, ''));
        this.reset();
      } else if (segment.length > 0) {
        // the socket may reuse its chunk; keep a copy of the partial line
        this.parts.push(Buffer.from(segment));
        this.size += segment.length;
      }

      if (newline === -1) {
        break;
      }
      start = newline + 1;
    }

    return { lines, overflows };
  }

  /** Drops any partial line. */
  reset() {
    this.parts = [];
    this.size = 0;
    this.discarding = false;
  }

  /** Bytes of the partial line held so far. */
  get pending(): number {
    return this.size;
  }
}
