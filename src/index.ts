import { config } from "./config.js";
import { isPumpError } from "./pump/errors.js";
import { SyringePumpClient } from "./pump/client.js";
import { isConnectivityError, summarizeConnectivityError } from "./utils/connectivity.js";

function validateConfig(): void {
  const errors: string[] = [];

  if (!config.serial.port) {
    errors.push("PUMP_PORT is required");
  }
  if (!Number.isInteger(config.serial.baudRate) || config.serial.baudRate <= 0) {
    errors.push("PUMP_BAUD_RATE must be a positive integer");
  }
  if (!Number.isInteger(config.pump.forcePercent) || config.pump.forcePercent < 1 || config.pump.forcePercent > 100) {
    errors.push("PUMP_FORCE_PCT must be an integer between 1 and 100");
  }

  if (errors.length > 0) {
    console.error("Configuration errors:");
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }
}

async function main() {
  validateConfig();

  console.log("Syringe pump driver starting...");
  console.log(`  Port: ${config.serial.port} @ ${config.serial.baudRate} baud`);
  console.log(`  Read timeout: ${config.serial.timeoutMs}ms`);
  console.log(`  Footswitch mode: ${config.pump.footswitchMode}`);
  console.log(`  Force: ${config.pump.forcePercent}%`);

  const pump = await SyringePumpClient.open({
    port: config.serial.port,
    baudRate: config.serial.baudRate,
    timeoutMs: config.serial.timeoutMs,
    ...config.pump,
    ...config.log,
  });

  try {
    const snapshot = pump.snapshot();
    console.log(`Syringe pump:        ${snapshot.version}`);
    console.log(`Syringe type:        ${snapshot.syringeType}`);
    console.log(`Target volume:       ${snapshot.targetVolume ?? "not set"}`);
    console.log(`Run direction:       ${snapshot.runDirection}`);
    console.log(`Flow rate:           ${snapshot.flowRate}`);
    console.log(`Estimated time (s):  ${snapshot.runTimeSeconds ?? "unknown"}`);
  } finally {
    await pump.close();
  }
}

main().catch((error) => {
  if (isConnectivityError(error)) {
    console.error(`Syringe pump unreachable (${summarizeConnectivityError(error)})`);
  } else if (isPumpError(error)) {
    console.error(`Syringe pump error [${error.kind}]: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
