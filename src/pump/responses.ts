import { ProtocolViolationError } from "./errors.js";
import type {
  FootswitchMode,
  PumpStatus,
  RateLimit,
  RateReading,
  RunDirection,
  VolumeReading,
} from "./types.js";
import { isRateUnit, isVolumeUnit, toCanonicalRate, toCanonicalVolume } from "./units.js";

export const TARGET_VOLUME_NOT_SET = "Target volume not set";

const FOOTSWITCH_REPLIES: ReadonlyMap<string, FootswitchMode> = new Map<string, FootswitchMode>([
  ["Momentary", "mom"],
  ["Active high", "rise"],
  ["Active low", "fall"],
]);

const DIRECTION_REPLIES: ReadonlyMap<string, RunDirection> = new Map<string, RunDirection>([
  ["Withdraw", "withdraw"],
  ["Infuse", "infuse"],
]);

function words(text: string): string[] {
  return text.trim().split(/\s+/).filter(Boolean);
}

function parseNumber(raw: string | undefined, what: string, text: string): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ProtocolViolationError(`unparsable ${what}: ${JSON.stringify(text)}`);
  }
  return value;
}

function wordAt(text: string, index: number, what: string): string {
  const word = words(text)[index];
  if (word === undefined) {
    throw new ProtocolViolationError(`unparsable ${what}: ${JSON.stringify(text)}`);
  }
  return word;
}

/** Parse a displayed rate such as `1.5 ul/min`. */
export function parseRate(text: string): RateReading {
  const [rawValue, unit] = words(text);
  const value = parseNumber(rawValue, "flow rate", text);
  if (!isRateUnit(unit)) {
    throw new ProtocolViolationError(`unexpected flow rate unit in ${JSON.stringify(text)}`);
  }
  return Object.freeze({ text: text.trim(), value, unit, plPerSecond: toCanonicalRate(value, unit) });
}

/** Parse a `wrate lim` / `irate lim` reply: `<min> <unit> to <max> <unit>`. */
export function parseRateLimit(text: string): RateLimit {
  const bounds = text.split(" to ");
  if (bounds.length !== 2) {
    throw new ProtocolViolationError(`unparsable flow rate limits: ${JSON.stringify(text)}`);
  }
  const [min, max] = bounds;
  return Object.freeze({ text: text.trim(), min: parseRate(min), max: parseRate(max) });
}

/** Parse a `tvolume` reply; null when no target volume is set. */
export function parseTargetVolume(text: string): VolumeReading | null {
  const trimmed = text.trim();
  if (trimmed === TARGET_VOLUME_NOT_SET) {
    return null;
  }
  const [rawValue, unit] = words(trimmed);
  const value = parseNumber(rawValue, "target volume", trimmed);
  if (!isVolumeUnit(unit)) {
    throw new ProtocolViolationError(`unexpected volume unit in ${JSON.stringify(trimmed)}`);
  }
  return Object.freeze({ text: trimmed, value, unit, picolitres: toCanonicalVolume(value, unit) });
}

/** `addr` reply, e.g. `Pump address is 0`: the fourth word. */
export function parseAddress(text: string): string {
  return wordAt(text, 3, "address");
}

/** `load` reply: the fourth word names the quick start direction. */
export function parseRunDirection(text: string): RunDirection {
  const word = wordAt(text, 3, "run direction");
  const direction = DIRECTION_REPLIES.get(word);
  if (direction === undefined) {
    throw new ProtocolViolationError(`run direction (${word}) not supported`);
  }
  return direction;
}

/** `force` reply, e.g. `50%`. */
export function parseForce(text: string): number {
  const [rawValue] = text.split("%");
  const value = parseNumber(rawValue.trim(), "force", text);
  if (!Number.isInteger(value)) {
    throw new ProtocolViolationError(`unparsable force: ${JSON.stringify(text)}`);
  }
  return value;
}

export function parseFootswitchMode(text: string): FootswitchMode {
  const mode = FOOTSWITCH_REPLIES.get(text.trim());
  if (mode === undefined) {
    throw new ProtocolViolationError(`unexpected footswitch mode: ${JSON.stringify(text)}`);
  }
  return mode;
}

/**
 * Parse a `status` reply: rate (fl/s), time (ms), volume (fl) and a six
 * character flag field.
 */
export function parseStatus(text: string): PumpStatus {
  const fields = words(text);
  if (fields.length < 4 || fields[3].length < 6) {
    throw new ProtocolViolationError(`unparsable status: ${JSON.stringify(text)}`);
  }
  const flags = fields[3];
  return Object.freeze({
    raw: text.trim(),
    rateFlPerSecond: parseNumber(fields[0], "status rate", text),
    timeMs: parseNumber(fields[1], "status time", text),
    volumeFl: parseNumber(fields[2], "status volume", text),
    motorDirection: flags[0],
    limitSwitch: flags[1],
    stall: flags[2],
    triggerInput: flags[3],
    directionPort: flags[4],
    targetReached: flags[5],
  });
}
