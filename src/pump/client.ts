import { setTimeout as sleep } from "node:timers/promises";
import { SerialLink } from "../serial/serialLink.js";
import type { PumpLink } from "../serial/types.js";
import { InvariantViolationError, PostConditionError, ValidationError } from "./errors.js";
import { createDriverLog } from "./log.js";
import type { DriverLog } from "./log.js";
import {
  parseAddress,
  parseFootswitchMode,
  parseForce,
  parseRate,
  parseRateLimit,
  parseRunDirection,
  parseStatus,
  parseTargetVolume,
} from "./responses.js";
import { RunLifecycle } from "./runLifecycle.js";
import type { RunOptions } from "./runLifecycle.js";
import { RunState } from "./runState.js";
import { PumpTransport } from "./transport.js";
import type {
  FlowRateRequest,
  FlowRates,
  FootswitchMode,
  PumpConnectOptions,
  PumpOptions,
  PumpSnapshot,
  PumpStatus,
  RateLimits,
  RunDirection,
  RunTimeEstimate,
  VolumeReading,
} from "./types.js";
import { isRateUnit, isVolumeUnit, toCanonicalRate, toCanonicalVolume } from "./units.js";

const FOOTSWITCH_MODES: readonly FootswitchMode[] = ["mom", "rise", "fall"];

const RATE_COMMAND: Record<RunDirection, string> = {
  withdraw: "wrate",
  infuse: "irate",
};

const LOAD_COMMAND: Record<RunDirection, string> = {
  withdraw: "load qs w",
  infuse: "load qs i",
};

function assertDirection(direction: unknown): asserts direction is RunDirection {
  if (direction !== "withdraw" && direction !== "infuse") {
    throw new ValidationError(`unknown run direction (${String(direction)})`);
  }
}

function runTime(volumePicolitres: number, plPerSecond: number): number {
  return Math.round((volumePicolitres / plPerSecond) * 1e6) / 1e6;
}

/**
 * Driver for a KDS Legato 110 syringe pump. Only the commands needed to load a
 * simple program (rate, target volume, direction) and run it are covered.
 *
 * The pump has to be in echo off / poll off / address 0 mode; the connection
 * handshake checks this and refuses to continue otherwise.
 */
export class SyringePumpClient {
  private options: PumpOptions;
  private log: DriverLog;
  private runState: RunState;
  private transport: PumpTransport;
  private lifecycle: RunLifecycle;

  private version: string | null = null;
  private versionLong: string[] = [];
  private syringeType: string | null = null;
  private footswitchMode: FootswitchMode | null = null;
  private forcePercent: number | null = null;
  private status: PumpStatus | null = null;
  private rateLimits: RateLimits | null = null;
  private flowRates: FlowRates | null = null;
  private targetVolume: VolumeReading | null = null;
  private runDirection: RunDirection | null = null;
  private runTimes: RunTimeEstimate | null = null;

  private constructor(link: PumpLink, options: PumpOptions) {
    this.options = options;
    this.log = createDriverLog(options.name, options.verbose, options.veryVerbose);
    this.runState = new RunState(options.onTargetReached);
    this.transport = new PumpTransport(link, this.runState, this.log);
    this.lifecycle = new RunLifecycle(this.transport, this.runState, this.log);
  }

  /** Open the serial port and run the connection handshake. */
  static async open(options: PumpConnectOptions): Promise<SyringePumpClient> {
    const log = createDriverLog(options.name, options.verbose, options.veryVerbose);
    log.info(`opening ${options.port}...`);
    const link = await SerialLink.open({
      path: options.port,
      baudRate: options.baudRate,
      timeoutMs: options.timeoutMs,
    });
    log.info(" -> done opening.");
    return SyringePumpClient.connect(link, options);
  }

  /** Run the connection handshake over an already open link. The link is closed if it fails. */
  static async connect(link: PumpLink, options: PumpOptions): Promise<SyringePumpClient> {
    const pump = new SyringePumpClient(link, options);
    try {
      await pump.initialize();
    } catch (error) {
      try {
        await pump.close();
      } catch (closeError) {
        pump.log.warn(`failed to close after handshake error: ${String(closeError)}`);
      }
      throw error;
    }
    return pump;
  }

  get name(): string {
    return this.options.name;
  }

  get running(): boolean {
    return this.lifecycle.running;
  }

  /** Number of runs whose "target reached" notice has been consumed. */
  get completedRuns(): number {
    return this.runState.completedRuns;
  }

  private async initialize(): Promise<void> {
    await this.expectSetting("echo", "OFF", (line) => line);
    await this.expectSetting("poll", "OFF", (line) => line);
    await this.expectSetting("addr", "0", parseAddress);

    const version = await this.getVersion();
    if (!version.startsWith(this.options.modelPrefix)) {
      throw new PostConditionError(
        `${this.name}: unexpected device (${version.slice(0, this.options.modelPrefix.length)})`,
      );
    }
    await this.getVersionLong();

    await this.setFootswitchMode(this.options.footswitchMode);
    await this.setForce(this.options.forcePercent);

    await this.getStatus();
    await this.estimateRunTime();
    await this.getSyringeType();
    await this.getFlowRateLimits();
    await this.getFlowRates();
    await this.getTargetVolume();
    await this.getRunDirection();
  }

  private async expectSetting(command: string, expected: string, parse: (line: string) => string): Promise<void> {
    this.log.trace(`getting ${command}`);
    const value = parse(await this.queryLine(command));
    this.log.trace(` = ${value}`);
    if (value !== expected) {
      throw new PostConditionError(`${this.name}: "${command}" is ${value}, expected ${expected}`);
    }
  }

  private async query(command: string, lines: number): Promise<string[]> {
    const result = await this.transport.exchange(command, lines);
    return result.lines;
  }

  private async queryLine(command: string): Promise<string> {
    const [line] = await this.query(command, 1);
    return line;
  }

  private async send(command: string): Promise<void> {
    await this.transport.exchange(command, 0);
  }

  /** Short model/firmware string from `ver`. */
  async getVersion(): Promise<string> {
    this.log.trace("getting ver");
    this.version = await this.queryLine("ver");
    this.log.trace(` = ${this.version}`);
    return this.version;
  }

  /** Extended version block from `version` (three lines). */
  async getVersionLong(): Promise<string[]> {
    this.log.trace("getting version");
    this.versionLong = await this.query("version", 3);
    for (const line of this.versionLong) {
      this.log.trace(` -> ${line}`);
    }
    return [...this.versionLong];
  }

  async getSyringeType(): Promise<string> {
    this.log.info("getting syringe type");
    this.syringeType = await this.queryLine("syrm");
    this.log.info(` = ${this.syringeType}`);
    return this.syringeType;
  }

  async getStatus(): Promise<PumpStatus> {
    this.log.trace("getting status");
    const status = parseStatus(await this.queryLine("status"));
    this.log.trace(`current rate (fL/s)   = ${status.rateFlPerSecond}`);
    this.log.trace(`infuse time    (ms)   = ${status.timeMs}`);
    this.log.trace(`infused volume (fL)   = ${status.volumeFl}`);
    this.log.trace(`motor direction       = ${status.motorDirection}`);
    this.log.trace(`limit switch status   = ${status.limitSwitch}`);
    this.log.trace(`stall status          = ${status.stall}`);
    this.log.trace(`trigger input state   = ${status.triggerInput}`);
    this.log.trace(`direction port state  = ${status.directionPort}`);
    this.log.trace(`target reached status = ${status.targetReached}`);
    this.status = status;
    return status;
  }

  /**
   * Run time in seconds for the current target volume at each direction's
   * rate. Fails when no target volume is set or either rate is zero.
   */
  async estimateRunTime(): Promise<RunTimeEstimate> {
    this.log.trace("estimating run time");
    const target = await this.getTargetVolume();
    const rates = await this.getFlowRates();

    if (target === null) {
      throw new PostConditionError(`${this.name}: no target volume set, cannot estimate run time`);
    }
    for (const direction of ["withdraw", "infuse"] as const) {
      if (rates[direction].plPerSecond === 0) {
        throw new PostConditionError(
          `${this.name}: ${direction} flow rate is zero (${rates[direction].text}), cannot estimate run time`,
        );
      }
    }
    this.runTimes = Object.freeze({
      withdrawSeconds: runTime(target.picolitres, rates.withdraw.plPerSecond),
      infuseSeconds: runTime(target.picolitres, rates.infuse.plPerSecond),
    });
    this.log.trace(`withdraw run time = ${this.runTimes.withdrawSeconds} (s)`);
    this.log.trace(`infuse   run time = ${this.runTimes.infuseSeconds} (s)`);
    return this.runTimes;
  }

  async getFootswitchMode(): Promise<FootswitchMode> {
    this.log.trace("getting footswitch mode");
    this.footswitchMode = parseFootswitchMode(await this.queryLine("ftswitch"));
    this.log.trace(` = ${this.footswitchMode}`);
    return this.footswitchMode;
  }

  /** "fall" makes a 5V TTL falling edge on the footswitch input start the program. */
  async setFootswitchMode(mode: FootswitchMode): Promise<void> {
    this.log.trace(`setting footswitch mode = ${mode}`);
    if (!FOOTSWITCH_MODES.includes(mode)) {
      throw new ValidationError(`${this.name}: unexpected footswitch mode (${String(mode)})`);
    }
    await this.send(`ftswitch ${mode}`);
    const actual = await this.getFootswitchMode();
    if (actual !== mode) {
      throw new PostConditionError(`${this.name}: unexpected footswitch mode (requested ${mode}, got ${actual})`);
    }
    this.log.trace(" -> done setting footswitch mode.");
  }

  async getForce(): Promise<number> {
    this.log.trace("getting force (%)");
    this.forcePercent = parseForce(await this.queryLine("force"));
    this.log.trace(` = ${this.forcePercent}`);
    return this.forcePercent;
  }

  async setForce(forcePercent: number): Promise<void> {
    this.log.trace(`setting force (%) = ${forcePercent}`);
    if (typeof forcePercent !== "number" || !Number.isInteger(forcePercent)) {
      throw new ValidationError(`${this.name}: force must be an integer percentage (got ${String(forcePercent)})`);
    }
    if (forcePercent < 1 || forcePercent > 100) {
      throw new ValidationError(`${this.name}: force (${forcePercent}%) out of range 1-100`);
    }
    await this.send(`force ${forcePercent}`);
    const actual = await this.getForce();
    if (actual !== forcePercent) {
      throw new PostConditionError(`${this.name}: unexpected force (requested ${forcePercent}%, got ${actual}%)`);
    }
    this.log.trace(" -> done setting force.");
  }

  async getFlowRateLimits(): Promise<RateLimits> {
    this.log.info("getting flow rate limits");
    const withdraw = parseRateLimit(await this.queryLine("wrate lim"));
    const infuse = parseRateLimit(await this.queryLine("irate lim"));
    this.log.info(`withdraw rate limits = ${withdraw.text}`);
    this.log.info(`infuse rate   limits = ${infuse.text}`);
    this.rateLimits = Object.freeze({ withdraw, infuse });
    return this.rateLimits;
  }

  async getFlowRates(): Promise<FlowRates> {
    this.log.info("getting flow rates");
    const withdraw = parseRate(await this.queryLine("wrate"));
    const infuse = parseRate(await this.queryLine("irate"));
    this.log.info(`withdraw rate = ${withdraw.text}`);
    this.log.info(`infuse rate   = ${infuse.text}`);
    this.flowRates = Object.freeze({ withdraw, infuse });
    return this.flowRates;
  }

  /**
   * Set the withdraw or infuse rate. `rate` is a whole number in `unit`, or
   * "min"/"max" (with no unit) for the limits reported by the pump.
   */
  async setFlowRate(direction: RunDirection, rate: FlowRateRequest, unit: string | null = null): Promise<void> {
    this.log.info(`setting flow rate = ${direction} ${rate} ${unit}`);
    assertDirection(direction);
    if (!this.rateLimits) {
      throw new InvariantViolationError(`${this.name}: flow rate limits have not been read`);
    }
    const limit = this.rateLimits[direction];

    let value: number;
    let rateUnit: string;
    if (rate === "min" || rate === "max") {
      if (unit !== null) {
        throw new ValidationError(`${this.name}: for "min" or "max" flow rate, leave the unit unset`);
      }
      // Round towards the inside of the range.
      value = rate === "min" ? Math.ceil(limit.min.value) : Math.floor(limit.max.value);
      rateUnit = rate === "min" ? limit.min.unit : limit.max.unit;
    } else {
      if (unit === null) {
        throw new ValidationError(`${this.name}: a unit is required for a numeric flow rate`);
      }
      value = rate;
      rateUnit = unit;
    }

    // Whole numbers only.
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new ValidationError(`${this.name}: unexpected type for flow rate (${String(value)}), integer required`);
    }
    if (value <= 0) {
      throw new ValidationError(`${this.name}: flow rate must be positive (got ${value})`);
    }
    if (!isRateUnit(rateUnit)) {
      throw new ValidationError(`${this.name}: unexpected unit for flow rate (${rateUnit})`);
    }

    const requested = toCanonicalRate(value, rateUnit);
    if (requested < limit.min.plPerSecond) {
      throw new ValidationError(
        `${this.name}: ${direction} flow rate (${value} ${rateUnit}) too low (min ${limit.min.text})`,
      );
    }
    if (requested > limit.max.plPerSecond) {
      throw new ValidationError(
        `${this.name}: ${direction} flow rate (${value} ${rateUnit}) too high (max ${limit.max.text})`,
      );
    }

    await this.send(`${RATE_COMMAND[direction]} ${value} ${rateUnit}`);
    const rates = await this.getFlowRates();
    if (rates[direction].plPerSecond !== requested) {
      throw new PostConditionError(
        `${this.name}: requested flow rate (${requested} pl/s) not set (${rates[direction].plPerSecond} pl/s)`,
      );
    }
    this.log.info(" -> done setting flow rate.");
  }

  /** Null when the pump has no target volume. */
  async getTargetVolume(): Promise<VolumeReading | null> {
    this.log.info("getting target volume");
    this.targetVolume = parseTargetVolume(await this.queryLine("tvolume"));
    this.log.info(` = ${this.targetVolume ? this.targetVolume.text : "not set"}`);
    return this.targetVolume;
  }

  async setTargetVolume(volume: number, unit: string): Promise<void> {
    this.log.info(`setting target volume = ${volume} ${unit}`);
    if (typeof volume !== "number" || !Number.isFinite(volume)) {
      throw new ValidationError(`${this.name}: unexpected type for volume (${String(volume)})`);
    }
    if (volume === 0) {
      throw new ValidationError(`${this.name}: zero target volume not allowed`);
    }
    if (volume < 0) {
      throw new ValidationError(`${this.name}: negative target volume not allowed (${volume})`);
    }
    if (!isVolumeUnit(unit)) {
      throw new ValidationError(`${this.name}: unexpected unit for volume (${unit})`);
    }

    const requested = `${volume} ${unit}`;
    await this.send(`tvolume ${requested}`);
    const actual = await this.getTargetVolume();
    // The pump may echo the same amount in another form ("1000 ul" for "1 ml").
    const matches =
      actual !== null &&
      (actual.text === requested ||
        Math.round(actual.picolitres) === Math.round(toCanonicalVolume(volume, unit)));
    if (!matches) {
      throw new PostConditionError(
        `${this.name}: unexpected target volume (requested ${requested}, got ${actual ? actual.text : "not set"})`,
      );
    }
    this.log.info(" -> done setting target volume.");
  }

  async getRunDirection(): Promise<RunDirection> {
    this.log.info("getting run direction");
    this.runDirection = parseRunDirection(await this.queryLine("load"));
    this.log.info(` = ${this.runDirection}`);
    return this.runDirection;
  }

  async setRunDirection(direction: RunDirection): Promise<void> {
    this.log.info(`setting run direction = ${direction}`);
    assertDirection(direction);
    await this.send(LOAD_COMMAND[direction]);
    const actual = await this.getRunDirection();
    if (actual !== direction) {
      throw new PostConditionError(`${this.name}: unexpected run direction (requested ${direction}, got ${actual})`);
    }
    // The pump is not ready for "run" straight after a direction change.
    if (this.options.directionSettleMs > 0) {
      await sleep(this.options.directionSettleMs);
    }
    this.log.info(" -> done setting run direction");
  }

  /** Run the loaded program. With `block: false` call finishRunning (or stop) later. */
  async run(options?: RunOptions): Promise<void> {
    await this.lifecycle.run(options);
  }

  async finishRunning(): Promise<void> {
    await this.lifecycle.finishRunning();
  }

  async stop(): Promise<void> {
    await this.lifecycle.stop();
  }

  /** Release the serial link. Does nothing when already closed. */
  async close(): Promise<void> {
    if (this.transport.isClosed) return;
    this.log.info("closing...");
    await this.transport.close();
    this.log.info(" -> done closing.");
  }

  /** Cached device state; refreshed only by the getters. */
  snapshot(): PumpSnapshot {
    const direction = this.runDirection;
    const rates = this.flowRates;
    return Object.freeze({
      version: this.version,
      versionLong: Object.freeze([...this.versionLong]),
      syringeType: this.syringeType,
      targetVolume: this.targetVolume ? this.targetVolume.text : null,
      targetVolumePicolitres: this.targetVolume ? this.targetVolume.picolitres : null,
      runDirection: direction,
      flowRate: direction && rates ? rates[direction].text : null,
      withdrawRate: rates ? rates.withdraw.text : null,
      infuseRate: rates ? rates.infuse.text : null,
      withdrawRateLimits: this.rateLimits ? this.rateLimits.withdraw.text : null,
      infuseRateLimits: this.rateLimits ? this.rateLimits.infuse.text : null,
      runTimeSeconds:
        direction && this.runTimes
          ? direction === "withdraw"
            ? this.runTimes.withdrawSeconds
            : this.runTimes.infuseSeconds
          : null,
      forcePercent: this.forcePercent,
      status: this.status,
      footswitchMode: this.footswitchMode,
      running: this.runState.running,
    });
  }
}
