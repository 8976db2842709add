// Byte-level link between the driver and the pump.

export interface SerialLinkOptions {
  path: string;
  baudRate: number;
  /** Read timeout in milliseconds; null blocks until data arrives. */
  timeoutMs: number | null;
}

export interface PumpLink {
  /** Read timeout applied to readLine/readByte. null disables it. */
  timeoutMs: number | null;
  readonly isOpen: boolean;

  write(data: string): Promise<void>;
  /** Read up to and including the next "\n"; resolves without the terminator. */
  readLine(): Promise<string>;
  /** Read exactly one byte as an ASCII character. */
  readByte(): Promise<string>;
  /** Number of received bytes not yet consumed by a read. */
  pending(): number;
  close(): Promise<void>;
}
