import { describe, it, expect, vi } from "vitest";

describe("config", () => {
  it("exports a config object with expected shape", async () => {
    // Dynamically import to avoid side effects from dotenv in other tests
    const { config } = await import("../src/config.js");

    expect(config).toHaveProperty("serial");
    expect(config).toHaveProperty("pump");
    expect(config).toHaveProperty("log");

    // Check defaults
    expect(config.serial.baudRate).toBe(115200);
    expect(config.serial.timeoutMs).toBe(1000);
    expect(config.pump.modelPrefix).toBe("Legato 110");
    expect(config.pump.footswitchMode).toBe("fall");
    expect(config.pump.forcePercent).toBe(50);
    expect(config.pump.directionSettleMs).toBe(200);
    expect(config.log.verbose).toBe(true);
    expect(config.log.veryVerbose).toBe(false);
  });

  it("reads overrides from the environment and ignores invalid values", async () => {
    const previous = { ...process.env };
    try {
      process.env.PUMP_PORT = "/dev/ttyACM1";
      process.env.PUMP_BAUD_RATE = "9600";
      process.env.PUMP_TIMEOUT_MS = "not-a-number";
      process.env.PUMP_FOOTSWITCH_MODE = "RISE";
      process.env.PUMP_FORCE_PCT = "";
      process.env.PUMP_DIRECTION_SETTLE_MS = "0";
      process.env.PUMP_VERBOSE = "off";
      process.env.PUMP_VERY_VERBOSE = "YES";

      vi.resetModules();
      const { config } = await import("../src/config.js");

      expect(config.serial.port).toBe("/dev/ttyACM1");
      expect(config.serial.baudRate).toBe(9600);
      expect(config.serial.timeoutMs).toBe(1000);
      expect(config.pump.footswitchMode).toBe("rise");
      expect(config.pump.forcePercent).toBe(50);
      expect(config.pump.directionSettleMs).toBe(0);
      expect(config.log.verbose).toBe(false);
      expect(config.log.veryVerbose).toBe(true);
    } finally {
      process.env = previous;
      vi.resetModules();
    }
  });

  it("falls back to the active-low footswitch for unknown modes", async () => {
    const previous = { ...process.env };
    try {
      process.env.PUMP_FOOTSWITCH_MODE = "toggle";

      vi.resetModules();
      const { config } = await import("../src/config.js");

      expect(config.pump.footswitchMode).toBe("fall");
    } finally {
      process.env = previous;
      vi.resetModules();
    }
  });
});
