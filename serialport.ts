/**
 * Line-oriented serial device built on the `serialport` package
 *
 * Frames incoming bytes into newline-terminated lines and exposes them through a
 * poll-then-read interface, so the reader loop never blocks on the port:
 * - available() reports how many complete lines are buffered
 * - readLine() takes one line and decodes it as strict UTF-8
 * - lines longer than MAX_LINE_BYTES are dropped and reported by readLine()
 * - waitForData() parks the caller until bytes, an error or a close arrive
 *
 * Transport failures are reported as SerialDeviceError and never thrown from
 * event handlers.
 */

import { SerialPort } from "serialport";
import pc from "picocolors";
import { SerialDeviceError } from "./errors";
import { logger } from "./logger";
import { MAX_LINE_BYTES, splitLines } from "./parser";

/** Default baud rate of the microcontroller firmware */
export const DEFAULT_BAUD_RATE = 115200;

/**
 * Options used to create the underlying port
 */
export interface PortOptions {
  path: string;
  baudRate: number;
}

/**
 * The subset of a `serialport` SerialPort the device relies on
 */
export interface PortHandle {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (err?: Error | null) => void): unknown;
  removeAllListeners(): unknown;
}

/**
 * Creates a port handle; replaced by a fake in tests
 */
export type PortFactory = (options: PortOptions) => PortHandle;

/**
 * A source of newline-terminated text lines
 */
export interface LineDevice {
  readonly path: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  available(): number;
  readLine(): string;
  waitForData(timeoutMs: number): Promise<void>;
}

const defaultPortFactory: PortFactory = (options) =>
  new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });

/**
 * Serial device that buffers complete lines from a single port
 *
 * @example
 * ```typescript
 * const device = new SerialLineDevice({ path: "/dev/ttyACM0" });
 * await device.open();
 * if (device.available() > 0) {
 *   console.log(device.readLine());
 * }
 * ```
 */
export class SerialLineDevice implements LineDevice {
  readonly path: string;
  readonly baudRate: number;

  private port: PortHandle | null = null;
  private closing = false;
  private buffer: Buffer = Buffer.alloc(0);
  private discarding = false;
  /** Queued lines; null marks a line dropped for length */
  private lines: (Buffer | null)[] = [];
  private pendingError: SerialDeviceError | null = null;
  private waiters = new Set<() => void>();
  private readonly createPort: PortFactory;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(options: { path: string; baudRate?: number; createPort?: PortFactory }) {
    this.path = options.path;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.createPort = options.createPort ?? defaultPortFactory;
  }

  get isOpen(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  /**
   * Opens the port, discarding anything buffered from a previous connection
   * @throws {SerialDeviceError} kind "open" if the port cannot be opened
   */
  async open(): Promise<void> {
    if (this.isOpen) {
      return;
    }
    this.detach();

    let port: PortHandle;
    try {
      port = this.createPort({ path: this.path, baudRate: this.baudRate });
    } catch (error) {
      throw this.openError(error);
    }

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(this.openError(err));
        } else {
          resolve();
        }
      });
    });

    this.buffer = Buffer.alloc(0);
    this.discarding = false;
    this.lines = [];
    this.pendingError = null;
    this.port = port;
    this.attach(port);
    logger.info(`Serial port ${pc.cyan(this.path)} opened at ${this.baudRate} baud`);
  }

  /**
   * Closes the port if it is open
   */
  async close(): Promise<void> {
    const port = this.port;
    if (!port) {
      return;
    }

    if (port.isOpen) {
      this.closing = true;
      try {
        await new Promise<void>((resolve, reject) => {
          port.close((err) => (err ? reject(err) : resolve()));
        });
      } finally {
        this.closing = false;
      }
    }
    this.detach();
    this.notify();
  }

  /**
   * Number of complete lines ready to read
   * @throws {SerialDeviceError} a transport error reported since the last call
   */
  available(): number {
    if (this.pendingError) {
      const error = this.pendingError;
      this.pendingError = null;
      throw error;
    }
    return this.lines.length;
  }

  /**
   * Takes the oldest buffered line and decodes it
   * @returns The decoded line, without its newline
   * @throws {SerialDeviceError} kind "read" when no line is buffered, kind "decode" on invalid UTF-8,
   *   kind "overflow" for a line dropped for length
   */
  readLine(): string {
    const raw = this.lines.shift();
    if (raw === undefined) {
      throw new SerialDeviceError(`No complete line available on ${this.path}`, {
        kind: "read",
        path: this.path,
      });
    }
    if (raw === null) {
      throw new SerialDeviceError(
        `Line on ${this.path} exceeded ${MAX_LINE_BYTES} bytes without a newline and was dropped`,
        { kind: "overflow", path: this.path }
      );
    }

    try {
      return this.decoder.decode(raw);
    } catch (error) {
      throw new SerialDeviceError(`Received bytes on ${this.path} are not valid UTF-8`, {
        kind: "decode",
        path: this.path,
        cause: error,
      });
    }
  }

  /**
   * Resolves once data, an error or a close arrives, or after timeoutMs
   */
  waitForData(timeoutMs: number): Promise<void> {
    if (this.lines.length > 0 || this.pendingError || !this.isOpen) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      this.waiters.add(wake);
    });
  }

  /**
   * Set up port event handlers
   */
  private attach(port: PortHandle): void {
    port.on("data", (chunk: Buffer) => {
      const result = splitLines(this.buffer, chunk, { discarding: this.discarding });
      this.buffer = result.buffer;
      this.discarding = result.discarding;
      for (let i = 0; i < result.overflowed; i++) {
        this.lines.push(null);
      }
      if (result.lines.length > 0 || result.overflowed > 0) {
        this.lines.push(...result.lines);
        this.notify();
      }
    });

    port.on("error", (err: Error) => {
      this.pendingError = new SerialDeviceError(
        `Serial port ${this.path} error: ${err.message}`,
        { kind: "read", path: this.path, cause: err }
      );
      this.notify();
    });

    port.on("close", (err?: Error | null) => {
      if (!this.closing) {
        logger.warn(
          `Serial port ${pc.cyan(this.path)} closed${err ? `: ${err.message}` : ""}`
        );
      }
      this.notify();
    });
  }

  private detach(): void {
    if (this.port) {
      this.port.removeAllListeners();
      this.port = null;
    }
  }

  private notify(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  private openError(cause: unknown): SerialDeviceError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new SerialDeviceError(`Failed to open serial port ${this.path}: ${message}`, {
      kind: "open",
      path: this.path,
      cause,
    });
  }
}
