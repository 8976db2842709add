import { SerialPort } from "serialport";
import { ConnectivityError } from "../pump/errors.js";
import { LineReader } from "./lineReader.js";
import type { PumpLink, SerialLinkOptions } from "./types.js";

/** PumpLink over a real serial port (8N1, no flow control). */
export class SerialLink implements PumpLink {
  timeoutMs: number | null;
  private port: SerialPort;
  private reader = new LineReader();
  private closed = false;

  private constructor(port: SerialPort, timeoutMs: number | null) {
    this.port = port;
    this.timeoutMs = timeoutMs;

    this.port.on("data", (data: Buffer) => {
      this.reader.feed(data);
    });
    this.port.on("error", (error: Error) => {
      this.reader.fail(new ConnectivityError(`Serial port error: ${error.message}`, { cause: error }));
    });
    this.port.on("close", () => {
      this.reader.fail(new ConnectivityError(`Serial port ${this.port.path} closed`));
    });
  }

  static async open(options: SerialLinkOptions): Promise<SerialLink> {
    let port: SerialPort;
    try {
      port = new SerialPort({
        path: options.path,
        baudRate: options.baudRate,
        dataBits: 8,
        parity: "none",
        stopBits: 1,
        rtscts: false,
        autoOpen: false,
      });
    } catch (error) {
      throw new ConnectivityError(`No connection on port ${options.path}`, { cause: error });
    }

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new ConnectivityError(`No connection on port ${options.path}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });

    return new SerialLink(port, options.timeoutMs);
  }

  get isOpen(): boolean {
    return !this.closed && this.port.isOpen;
  }

  async write(data: string): Promise<void> {
    if (!this.isOpen) {
      throw new ConnectivityError(`Serial port ${this.port.path} is not open`);
    }
    await new Promise<void>((resolve, reject) => {
      this.port.write(Buffer.from(data, "ascii"), (err) => {
        if (err) {
          reject(new ConnectivityError(`Serial write failed: ${err.message}`, { cause: err }));
          return;
        }
        this.port.drain((drainErr) => {
          if (drainErr) {
            reject(new ConnectivityError(`Serial drain failed: ${drainErr.message}`, { cause: drainErr }));
          } else {
            resolve();
          }
        });
      });
    });
  }

  readLine(): Promise<string> {
    return this.reader.readLine(this.timeoutMs);
  }

  readByte(): Promise<string> {
    return this.reader.readByte(this.timeoutMs);
  }

  pending(): number {
    return this.reader.pending();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.port.close((err) => {
        if (err) {
          reject(new ConnectivityError(`Failed to close ${this.port.path}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}
