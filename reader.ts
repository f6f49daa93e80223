import { setTimeout as delay } from "node:timers/promises";
import pc from "picocolors";
import { describeError, SerialDeviceError } from "./errors";
import { logger } from "./logger";
import { parseReadingLine } from "./parser";
import type { LineDevice } from "./serialport";
import type { ReadingStore } from "./snapshot";

/** Pause after a device-level error before the next attempt */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/** Pause after opening the port, while the board resets */
export const DEFAULT_SETTLE_MS = 1000;

/** How long an idle poll waits for new data */
export const DEFAULT_POLL_INTERVAL_MS = 50;

/**
 * What a single loop iteration did
 */
export type TickOutcome = "published" | "malformed" | "idle" | "device-error";

export interface ReaderLoopOptions {
  retryDelayMs?: number;
  settleMs?: number;
  pollIntervalMs?: number;
  /** Injected so tests do not wait on real timers; rejects when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Counters describing what the loop has seen since start
 */
export interface ReaderStats {
  linesReceived: number;
  readingsPublished: number;
  malformedLines: number;
  deviceErrors: number;
  lastError: string | null;
}

/**
 * Background loop that owns the serial device and publishes readings
 *
 * Malformed lines are dropped and the loop moves straight on. Device errors
 * (open, read, decode) are followed by a fixed retry delay, retried forever.
 * The loop is the only writer of the ReadingStore.
 */
export class ReaderLoop {
  private readonly retryDelayMs: number;
  private readonly settleMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly counters: ReaderStats = {
    linesReceived: 0,
    readingsPublished: 0,
    malformedLines: 0,
    deviceErrors: 0,
    lastError: null,
  };

  constructor(
    private readonly device: LineDevice | null,
    private readonly store: ReadingStore,
    options: ReaderLoopOptions = {}
  ) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  get stats(): Readonly<ReaderStats> {
    return { ...this.counters };
  }

  /**
   * Runs until the signal aborts; without a device it returns at once.
   * An abort also cuts short a settle or retry pause in progress.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (!this.device) {
      return;
    }

    logger.log(`Reading sensor data from ${pc.cyan(this.device.path)}`);
    while (!signal?.aborted) {
      try {
        await this.tick(signal);
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        throw error;
      }
    }
  }

  /**
   * Performs one poll-parse-publish iteration
   * @param signal - Aborts the settle and retry pauses
   */
  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    const device = this.device;
    if (!device) {
      return "idle";
    }

    let line: string;
    try {
      if (!device.isOpen) {
        await device.open();
        await this.sleep(this.settleMs, signal);
      }

      if (device.available() === 0) {
        await device.waitForData(this.pollIntervalMs);
        return "idle";
      }

      line = device.readLine();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (error instanceof SerialDeviceError && error.kind === "overflow") {
        this.counters.linesReceived++;
        this.counters.malformedLines++;
        logger.warn(`${pc.yellow("Invalid data:")} ${error.message}`);
        return "malformed";
      }
      this.counters.deviceErrors++;
      this.counters.lastError = describeError(error);
      logger.error(`${pc.red("Serial error:")} ${this.counters.lastError}`);
      await this.sleep(this.retryDelayMs, signal);
      return "device-error";
    }

    this.counters.linesReceived++;
    logger.debug(`Received: ${line}`);

    const parsed = parseReadingLine(line);
    if (!parsed.valid) {
      this.counters.malformedLines++;
      logger.warn(`${pc.yellow("Invalid data:")} ${parsed.error}`);
      return "malformed";
    }

    this.store.publish(parsed.reading);
    this.counters.readingsPublished++;
    logger.debug("Parsed:", parsed.reading);
    return "published";
  }
}
