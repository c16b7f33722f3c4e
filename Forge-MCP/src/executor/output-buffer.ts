/**
 * Bounded head+tail capture for subprocess output.
 *
 * Keeps at most `maxChars` characters from the start and the last `tail`
 * characters of the stream, so a chatty process cannot grow memory without
 * bound. When the stream exceeds `maxChars` the rendered text is the first
 * `head` characters, a separator, and the last `tail` characters: the start
 * usually holds results and the end holds the error.
 */

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export class OutputBuffer {
  private headBuf = '';
  private tailBuf = '';
  private total = 0;

  constructor(private readonly limits: TruncateConfig) {}

  append(chunk: string): void {
    if (chunk.length === 0) return;
    this.total += chunk.length;
    if (this.headBuf.length < this.limits.maxChars) {
      this.headBuf += chunk.slice(0, this.limits.maxChars - this.headBuf.length);
    }
    this.tailBuf = (this.tailBuf + chunk).slice(-this.limits.tail);
  }

  get length(): number {
    return this.total;
  }

  result(): TruncateResult {
    if (this.total <= this.limits.maxChars) {
      return { text: this.headBuf, truncated: false };
    }
    const dropped = this.total - this.limits.head - this.limits.tail;
    const separator = `\n\n[... truncated ${dropped} characters ...]\n\n`;
    return {
      text: this.headBuf.slice(0, this.limits.head) + separator + this.tailBuf,
      truncated: true,
    };
  }

  toString(): string {
    return this.result().text;
  }
}
