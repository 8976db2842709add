import { ValidationError } from "./errors.js";

// Canonical units: picolitres (pl) for volume, pl/s for flow rate.

export const VOLUME_UNITS = ["ml", "ul", "nl", "pl"] as const;
export const TIME_UNITS = ["hr", "min", "sec"] as const;

export type VolumeUnit = (typeof VOLUME_UNITS)[number];
export type TimeUnit = (typeof TIME_UNITS)[number];
export type RateUnit = `${VolumeUnit}/${TimeUnit}`;

/** Exact conversion factor, kept as an integer ratio until the final division. */
export interface Ratio {
  num: number;
  den: number;
}

const PICOLITRES_PER: Record<VolumeUnit, number> = {
  ml: 1_000_000_000,
  ul: 1_000_000,
  nl: 1_000,
  pl: 1,
};

const SECONDS_PER: Record<TimeUnit, number> = {
  hr: 3600,
  min: 60,
  sec: 1,
};

function rate(volume: VolumeUnit, time: TimeUnit): Ratio {
  return { num: PICOLITRES_PER[volume], den: SECONDS_PER[time] };
}

export const RATE_UNIT_TABLE: Readonly<Record<RateUnit, Ratio>> = Object.freeze({
  "ml/hr": rate("ml", "hr"),
  "ul/hr": rate("ul", "hr"),
  "nl/hr": rate("nl", "hr"),
  "pl/hr": rate("pl", "hr"),
  "ml/min": rate("ml", "min"),
  "ul/min": rate("ul", "min"),
  "nl/min": rate("nl", "min"),
  "pl/min": rate("pl", "min"),
  "ml/sec": rate("ml", "sec"),
  "ul/sec": rate("ul", "sec"),
  "nl/sec": rate("nl", "sec"),
  "pl/sec": rate("pl", "sec"),
});

/** Every volume unit crossed with every time unit. */
export const RATE_UNITS: readonly RateUnit[] = VOLUME_UNITS.flatMap((volume) =>
  TIME_UNITS.map((time): RateUnit => `${volume}/${time}`),
);

export function isRateUnit(value: unknown): value is RateUnit {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(RATE_UNIT_TABLE, value);
}

export function isVolumeUnit(value: unknown): value is VolumeUnit {
  return typeof value === "string" && VOLUME_UNITS.some((unit) => unit === value);
}

function requireFinite(value: number, what: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`${what} must be a finite number (got ${String(value)})`);
  }
}

/** Convert a rate to whole pl/s. Rounds to the nearest canonical unit. */
export function toCanonicalRate(value: number, unit: string): number {
  if (!isRateUnit(unit)) {
    throw new ValidationError(`unknown flow rate unit "${unit}"`);
  }
  requireFinite(value, "flow rate");
  const { num, den } = RATE_UNIT_TABLE[unit];
  return Math.round((value * num) / den);
}

/** Inverse of toCanonicalRate. Not rounded. */
export function fromCanonicalRate(plPerSecond: number, unit: string): number {
  if (!isRateUnit(unit)) {
    throw new ValidationError(`unknown flow rate unit "${unit}"`);
  }
  requireFinite(plPerSecond, "flow rate");
  const { num, den } = RATE_UNIT_TABLE[unit];
  return (plPerSecond * den) / num;
}

/**
 * Convert a volume to picolitres. Fractional picolitres are kept: the device
 * only ever reports them in its own readouts, never at the command boundary.
 */
export function toCanonicalVolume(value: number, unit: string): number {
  if (!isVolumeUnit(unit)) {
    throw new ValidationError(`unknown volume unit "${unit}"`);
  }
  requireFinite(value, "volume");
  return value * PICOLITRES_PER[unit];
}
