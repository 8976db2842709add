const LINE_FEED = 0x0a;

export class ReadTimeoutError extends Error {
  constructor(what: string, timeoutMs: number) {
    super(`Read timeout: no ${what} within ${timeoutMs}ms`);
    this.name = "ReadTimeoutError";
  }
}

type ReadKind = "line" | "byte";

interface PendingRead {
  kind: ReadKind;
  resolve: (value: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Buffers bytes pushed from a stream and hands them out as lines or single
 * bytes, blocking (up to a timeout) until enough data has arrived. One read
 * may be outstanding at a time.
 */
export class LineReader {
  private buffer: Buffer = Buffer.alloc(0);
  private read: PendingRead | null = null;
  private failure: Error | null = null;

  feed(chunk: Buffer | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "ascii") : chunk;
    this.buffer = Buffer.concat([this.buffer, bytes]);
    this.drain();
  }

  /** Reject the outstanding read and every later one, e.g. once the port closed. */
  fail(error: Error): void {
    this.failure = error;
    const read = this.read;
    if (read) {
      this.read = null;
      if (read.timer) clearTimeout(read.timer);
      read.reject(error);
    }
  }

  pending(): number {
    return this.buffer.length;
  }

  readLine(timeoutMs: number | null): Promise<string> {
    return this.enqueue("line", timeoutMs);
  }

  readByte(timeoutMs: number | null): Promise<string> {
    return this.enqueue("byte", timeoutMs);
  }

  private enqueue(kind: ReadKind, timeoutMs: number | null): Promise<string> {
    if (this.read) {
      return Promise.reject(new Error(`Cannot read a ${kind} while another read is outstanding`));
    }

    const available = this.take(kind);
    if (available !== null) {
      return Promise.resolve(available);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const read: PendingRead = { kind, resolve, reject, timer: null };
      if (timeoutMs !== null) {
        read.timer = setTimeout(() => {
          if (this.read === read) {
            this.read = null;
            reject(new ReadTimeoutError(kind, timeoutMs));
          }
        }, timeoutMs);
      }
      this.read = read;
    });
  }

  private drain(): void {
    const read = this.read;
    if (!read) return;

    const value = this.take(read.kind);
    if (value === null) return;

    this.read = null;
    if (read.timer) clearTimeout(read.timer);
    read.resolve(value);
  }

  private take(kind: ReadKind): string | null {
    if (kind === "byte") {
      if (this.buffer.length === 0) return null;
      const byte = this.buffer.subarray(0, 1).toString("ascii");
      this.buffer = this.buffer.subarray(1);
      return byte;
    }

    const end = this.buffer.indexOf(LINE_FEED);
    if (end === -1) return null;
    const line = this.buffer.subarray(0, end).toString("ascii");
    this.buffer = this.buffer.subarray(end + 1);
    return line;
  }
}
