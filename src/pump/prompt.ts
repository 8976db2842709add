import type { PumpLink } from "../serial/types.js";
import { ProtocolViolationError } from "./errors.js";
import type { Prompt } from "./types.js";

/** The status byte the pump appends to every response. "T" only ever arrives as "T*". */
const PROMPT_BYTES: ReadonlyMap<string, Prompt> = new Map<string, Prompt>([
  [":", "idle"],
  [">", "infusing"],
  ["<", "withdrawing"],
  ["*", "stalled"],
]);

const TARGET_REACHED_LEAD = "T";
const TARGET_REACHED_TRAIL = "*";

export const PROMPT_MESSAGES: Readonly<Record<Prompt, string>> = Object.freeze({
  idle: "The pump is idle",
  infusing: "The pump is infusing",
  withdrawing: "The pump is withdrawing",
  stalled: "The pump stalled",
  targetReached: "The target was reached",
});

/** True when `byte` needs a second byte before it can be decoded. */
export function needsLookahead(byte: string): boolean {
  return byte === TARGET_REACHED_LEAD;
}

/**
 * Map a prompt byte (plus the following byte for "T*") to pump status.
 * Anything outside the prompt alphabet is a protocol violation.
 */
export function decodePrompt(byte: string, next?: string): Prompt {
  if (byte === TARGET_REACHED_LEAD) {
    if (next !== TARGET_REACHED_TRAIL) {
      throw new ProtocolViolationError(
        `unexpected prompt: "T" followed by ${next === undefined ? "nothing" : JSON.stringify(next)}`,
      );
    }
    return "targetReached";
  }

  const prompt = PROMPT_BYTES.get(byte);
  if (prompt === undefined) {
    throw new ProtocolViolationError(`unexpected prompt = ${JSON.stringify(byte)}`);
  }
  return prompt;
}

/** Read one prompt off the link, doing the lookahead read for "T*". */
export async function readPrompt(link: PumpLink): Promise<Prompt> {
  const byte = await link.readByte();
  if (needsLookahead(byte)) {
    return decodePrompt(byte, await link.readByte());
  }
  return decodePrompt(byte);
}
