import "dotenv/config";
import type { FootswitchMode } from "./pump/types.js";

function parseEnvNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") {
    return false;
  }
  return defaultValue;
}

function parseFootswitchMode(value: string | undefined): FootswitchMode {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "mom" || normalized === "rise" || normalized === "fall") {
    return normalized;
  }
  return "fall";
}

export const config = {
  serial: {
    port: process.env.PUMP_PORT || "/dev/ttyUSB0",
    baudRate: parseEnvNumber(process.env.PUMP_BAUD_RATE, 115200),
    timeoutMs: parseEnvNumber(process.env.PUMP_TIMEOUT_MS, 1000),
  },
  pump: {
    name: process.env.PUMP_NAME || "Legato110",
    modelPrefix: process.env.PUMP_MODEL_PREFIX || "Legato 110",
    // Defaults chosen for glass syringes; adjust per syringe type.
    footswitchMode: parseFootswitchMode(process.env.PUMP_FOOTSWITCH_MODE),
    forcePercent: parseEnvNumber(process.env.PUMP_FORCE_PCT, 50),
    directionSettleMs: parseEnvNumber(process.env.PUMP_DIRECTION_SETTLE_MS, 200),
  },
  log: {
    verbose: parseEnvBoolean(process.env.PUMP_VERBOSE, true),
    veryVerbose: parseEnvBoolean(process.env.PUMP_VERY_VERBOSE, false),
  },
} as const;
