import { LineReader } from "../../src/serial/lineReader.js";
import type { PumpLink } from "../../src/serial/types.js";

/** PumpLink that answers each write with the next canned byte string. */
export class ScriptedLink implements PumpLink {
  timeoutMs: number | null = 50;
  readonly writes: string[] = [];
  closeCount = 0;
  private replies: string[] = [];
  private reader = new LineReader();

  constructor(...replies: string[]) {
    this.replies = replies;
  }

  get isOpen(): boolean {
    return this.closeCount === 0;
  }

  reply(...bytes: string[]): this {
    this.replies.push(...bytes);
    return this;
  }

  inject(bytes: string): void {
    this.reader.feed(bytes);
  }

  async write(data: string): Promise<void> {
    this.writes.push(data);
    const next = this.replies.shift();
    if (next !== undefined) {
      this.reader.feed(next);
    }
  }

  readLine(): Promise<string> {
    return this.reader.readLine(this.timeoutMs);
  }

  readByte(): Promise<string> {
    return this.reader.readByte(this.timeoutMs);
  }

  pending(): number {
    return this.reader.pending();
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}
