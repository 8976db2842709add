// Legato pump driver type definitions

import type { RateUnit, VolumeUnit } from "./units.js";

export type Prompt = "idle" | "infusing" | "withdrawing" | "stalled" | "targetReached";

export type RunDirection = "withdraw" | "infuse";

/** Footswitch (trigger input) convention: momentary, rising edge or falling edge. */
export type FootswitchMode = "mom" | "rise" | "fall";

export interface ExchangeResult {
  lines: string[];
  prompt: Prompt;
}

/** A value as the pump displays it, e.g. `5 ml/min`. */
export interface RateReading {
  readonly text: string;
  readonly value: number;
  readonly unit: RateUnit;
  /** Rounded to whole pl/s. */
  readonly plPerSecond: number;
}

export interface RateLimit {
  readonly text: string;
  readonly min: RateReading;
  readonly max: RateReading;
}

export interface RateLimits {
  readonly withdraw: RateLimit;
  readonly infuse: RateLimit;
}

export interface FlowRates {
  readonly withdraw: RateReading;
  readonly infuse: RateReading;
}

export interface VolumeReading {
  readonly text: string;
  readonly value: number;
  readonly unit: VolumeUnit;
  readonly picolitres: number;
}

/** Parsed `status` line. */
export interface PumpStatus {
  readonly raw: string;
  /** Current rate in fl/s. */
  readonly rateFlPerSecond: number;
  /** Elapsed run time in ms. */
  readonly timeMs: number;
  /** Infused/withdrawn volume in fl. */
  readonly volumeFl: number;
  readonly motorDirection: string;
  readonly limitSwitch: string;
  readonly stall: string;
  readonly triggerInput: string;
  readonly directionPort: string;
  readonly targetReached: string;
}

export interface RunTimeEstimate {
  readonly withdrawSeconds: number;
  readonly infuseSeconds: number;
}

export interface PumpOptions {
  /** Prefix for log lines and error messages. */
  name: string;
  /** The `ver` reply must start with this. */
  modelPrefix: string;
  footswitchMode: FootswitchMode;
  forcePercent: number;
  /** Pause after changing run direction; the pump needs it before the next run. */
  directionSettleMs: number;
  verbose: boolean;
  veryVerbose: boolean;
  onTargetReached?: () => void;
}

export interface PumpConnectOptions extends PumpOptions {
  port: string;
  baudRate: number;
  timeoutMs: number;
}

export type FlowRateRequest = number | "min" | "max";

/** Immutable view of the driver's cached device state, for display. */
export interface PumpSnapshot {
  readonly version: string | null;
  readonly versionLong: readonly string[];
  readonly syringeType: string | null;
  readonly targetVolume: string | null;
  readonly targetVolumePicolitres: number | null;
  readonly runDirection: RunDirection | null;
  /** Rate for the current run direction, as displayed. */
  readonly flowRate: string | null;
  readonly withdrawRate: string | null;
  readonly infuseRate: string | null;
  readonly withdrawRateLimits: string | null;
  readonly infuseRateLimits: string | null;
  /** Estimated run time (s) for the current run direction. */
  readonly runTimeSeconds: number | null;
  readonly forcePercent: number | null;
  /** Last `status` reply read. */
  readonly status: Readonly<PumpStatus> | null;
  readonly footswitchMode: FootswitchMode | null;
  readonly running: boolean;
}
