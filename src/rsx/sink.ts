export interface RenderSink {
  write(chunk: string): void;
  end(): void;
}

export class StringSink implements RenderSink {
  private chunks: string[] = [];
  private bufferChunks: string[] = [];
  private bufferLen = 0;

  // Typst pages produce thousands of glyph paths; batch the many small
  // writes into larger chunks before joining.
  private static readonly FLUSH_THRESHOLD = 8 * 1024;

  write(chunk: string) {
    if (!chunk) return;
    this.bufferChunks.push(chunk);
    this.bufferLen += chunk.length;
    if (this.bufferLen >= StringSink.FLUSH_THRESHOLD) this.flush();
  }

  end() {
    this.flush();
  }

  toString() {
    // Include buffered content even if end() wasn't called.
    this.flush();
    return this.chunks.join('');
  }

  private flush() {
    if (!this.bufferLen) return;
    this.chunks.push(this.bufferChunks.join(''));
    this.bufferChunks = [];
    this.bufferLen = 0;
  }
}
