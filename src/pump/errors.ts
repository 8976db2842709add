// Error taxonomy for the pump driver. None of these are retried by the driver.

export type PumpErrorKind =
  | "connectivity"
  | "protocol"
  | "validation"
  | "postcondition"
  | "invariant";

export abstract class PumpError extends Error {
  abstract readonly kind: PumpErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The serial link could not be opened, or went away underneath the driver. */
export class ConnectivityError extends PumpError {
  readonly kind = "connectivity";
}

/**
 * The byte stream did not look like the protocol: wrong line count, unknown
 * prompt, leftover data. Framing state is unknown afterwards.
 */
export class ProtocolViolationError extends PumpError {
  readonly kind = "protocol";
}

/** Caller-supplied value rejected before anything was sent. */
export class ValidationError extends PumpError {
  readonly kind = "validation";
}

/** The device reports something other than what was just requested. */
export class PostConditionError extends PumpError {
  readonly kind = "postcondition";
}

/** Driver misuse, e.g. finishing a run that was never started. */
export class InvariantViolationError extends PumpError {
  readonly kind = "invariant";
}

export function isPumpError(error: unknown): error is PumpError {
  return error instanceof PumpError;
}
