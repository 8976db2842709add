import { InvariantViolationError } from "./errors.js";
import type { DriverLog } from "./log.js";
import type { RunState } from "./runState.js";
import type { PumpTransport } from "./transport.js";

export interface RunOptions {
  /** Wait for the pump to report "target reached" before resolving. Default true. */
  block?: boolean;
}

export class RunLifecycle {
  private transport: PumpTransport;
  private state: RunState;
  private log: DriverLog;

  constructor(transport: PumpTransport, state: RunState, log: DriverLog) {
    this.transport = transport;
    this.state = state;
    this.log = log;
  }

  get running(): boolean {
    return this.state.running;
  }

  /** Start the currently loaded program. A run still in progress is finished first. */
  async run(options: RunOptions = {}): Promise<void> {
    const block = options.block ?? true;
    if (this.state.running) {
      await this.finishRunning();
    }
    this.log.info("running");
    await this.transport.exchange("run", 0);
    this.state.begin();
    if (block) {
      await this.finishRunning();
    }
  }

  /**
   * Block, with no read timeout, until the current run reports "target
   * reached". A run can legitimately take hours.
   */
  async finishRunning(): Promise<void> {
    if (!this.state.running) {
      throw new InvariantViolationError("finishRunning called while the pump is not running");
    }
    const timeout = this.transport.timeoutMs;
    this.transport.timeoutMs = null;
    try {
      await this.transport.awaitCompletion();
    } finally {
      this.transport.timeoutMs = timeout;
    }
    this.log.info(" -> finished running");
  }

  /** Stop the pump whether or not a run is in progress. */
  async stop(): Promise<void> {
    this.log.info("stopping");
    await this.transport.exchange("stop", 0);
    this.state.cancel();
  }
}
