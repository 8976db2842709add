export interface DriverLog {
  /** Operation-level progress ("getting flow rates"). */
  info(message: string): void;
  /** Wire-level detail: commands, response lines, prompts. */
  trace(message: string): void;
  warn(message: string): void;
}

export function createDriverLog(name: string, verbose: boolean, veryVerbose: boolean): DriverLog {
  return {
    info(message) {
      if (verbose) console.log(`${name}: ${message}`);
    },
    trace(message) {
      if (veryVerbose) console.log(`${name}: ${message}`);
    },
    warn(message) {
      console.warn(`${name}: ${message}`);
    },
  };
}
