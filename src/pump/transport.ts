import { ReadTimeoutError } from "../serial/lineReader.js";
import type { PumpLink } from "../serial/types.js";
import { InvariantViolationError, ProtocolViolationError } from "./errors.js";
import type { DriverLog } from "./log.js";
import { PROMPT_MESSAGES, readPrompt } from "./prompt.js";
import type { RunState } from "./runState.js";
import type { ExchangeResult, Prompt } from "./types.js";

const COMMAND_TERMINATOR = "\r";

/**
 * Command/response framing. A response is: one blank line, the declared number
 * of text lines, then a prompt. This is also the only place that recognises a
 * "target reached" notice from a non-blocking run turning up next to the
 * response of some other command.
 */
export class PumpTransport {
  private link: PumpLink;
  private runState: RunState;
  private log: DriverLog;
  private busy = false;
  private closed = false;

  constructor(link: PumpLink, runState: RunState, log: DriverLog) {
    this.link = link;
    this.runState = runState;
    this.log = log;
  }

  get timeoutMs(): number | null {
    return this.link.timeoutMs;
  }

  set timeoutMs(value: number | null) {
    this.link.timeoutMs = value;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Send one command and read its fixed-size response. */
  async exchange(command: string, expectedLines: number): Promise<ExchangeResult> {
    if (!Number.isInteger(expectedLines) || expectedLines < 0) {
      throw new InvariantViolationError(`invalid expected line count (${expectedLines}) for "${command}"`);
    }

    return this.exclusive(async () => {
      if (this.link.pending() !== 0) {
        if (!this.runState.running) {
          await this.rejectTrailingData("stale data before command");
        }
        // The run finished while the link was idle.
        this.log.trace(`completion notice pending before "${command}"`);
        await this.readCompletion();
        this.runState.complete();
      }

      this.log.trace(`sending cmd = ${JSON.stringify(command + COMMAND_TERMINATOR)}`);
      await this.link.write(command + COMMAND_TERMINATOR);
      await this.readLine(`blank line after "${command}"`);

      const lines: string[] = [];
      for (let i = 0; i < expectedLines; i++) {
        const line = (await this.readLine(`response line ${i + 1}/${expectedLines} to "${command}"`)).trim();
        this.log.trace(`response (${i}) = ${line}`);
        lines.push(line);
      }

      const prompt = await this.readPromptFor(`prompt after "${command}"`);

      if (this.link.pending() !== 0) {
        if (!this.runState.running) {
          await this.rejectTrailingData("unexpected response");
        }
        // The run finished while this command was in flight.
        this.log.trace(`completion notice trailing "${command}"`);
        await this.readCompletion();
        this.runState.complete();
      }

      return { lines, prompt };
    });
  }

  /**
   * Wait for the "target reached" notice of the current run. Uses whatever
   * read timeout is set on the link. The run only counts as finished once
   * nothing follows the notice.
   */
  async awaitCompletion(): Promise<void> {
    await this.exclusive(async () => {
      await this.readCompletion();
      if (this.link.pending() !== 0) {
        await this.rejectTrailingData("unexpected data after target reached");
      }
      this.runState.complete();
    });
  }

  /** Release the link. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.link.close();
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new InvariantViolationError("link is closed");
    }
    if (this.busy) {
      throw new InvariantViolationError("another exchange is still in progress");
    }
    this.busy = true;
    try {
      return await fn();
    } finally {
      this.busy = false;
    }
  }

  private async readCompletion(): Promise<void> {
    await this.readLine("blank line before target reached");
    const prompt = await this.readPromptFor("target reached prompt");
    if (prompt !== "targetReached") {
      throw new ProtocolViolationError(`expected target reached, got ${prompt} (${PROMPT_MESSAGES[prompt]})`);
    }
  }

  private async rejectTrailingData(reason: string): Promise<never> {
    let line: string;
    try {
      line = (await this.link.readLine()).trim();
    } catch (error) {
      throw new ProtocolViolationError(`${reason} (${this.link.pending()} byte(s) unread)`, { cause: error });
    }
    throw new ProtocolViolationError(`${reason} = ${line}`);
  }

  private async readLine(what: string): Promise<string> {
    try {
      return await this.link.readLine();
    } catch (error) {
      throw this.translateReadError(error, what);
    }
  }

  private async readPromptFor(what: string): Promise<Prompt> {
    try {
      const prompt = await readPrompt(this.link);
      this.log.trace(`prompt = ${prompt} (${PROMPT_MESSAGES[prompt]})`);
      return prompt;
    } catch (error) {
      throw this.translateReadError(error, what);
    }
  }

  private translateReadError(error: unknown, what: string): unknown {
    if (error instanceof ReadTimeoutError) {
      return new ProtocolViolationError(`timed out waiting for ${what}`, { cause: error });
    }
    return error;
  }
}
