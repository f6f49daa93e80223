/**
 * Tests for the reader loop: parsing, publishing and retry timing
 * Uses a scripted in-memory device and a recorded sleep instead of real timers
 */

import { describe, test, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { SerialDeviceError } from "./errors";
import { logger } from "./logger";
import { ReaderLoop } from "./reader";
import type { LineDevice } from "./serialport";
import { ReadingStore } from "./snapshot";

const ZERO = { angle: 0, distance: 0, humidity: 0, temperatureC: 0, temperatureF: 0 };

/**
 * Scripted line device
 */
class FakeDevice implements LineDevice {
  readonly path = "/dev/ttyFAKE0";
  isOpen = false;
  opens = 0;
  openError: Error | null = null;
  lines: string[] = [];
  availableErrors: Error[] = [];
  readErrors: Error[] = [];
  waits: number[] = [];
  onIdle: (() => void) | null = null;

  async open(): Promise<void> {
    this.opens++;
    if (this.openError) {
      throw this.openError;
    }
    this.isOpen = true;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  available(): number {
    const error = this.availableErrors.shift();
    if (error) {
      throw error;
    }
    return this.lines.length;
  }

  readLine(): string {
    const error = this.readErrors.shift();
    if (error) {
      throw error;
    }
    const line = this.lines.shift();
    if (line === undefined) {
      throw new Error("No line scripted");
    }
    return line;
  }

  async waitForData(timeoutMs: number): Promise<void> {
    this.waits.push(timeoutMs);
    this.onIdle?.();
  }
}

describe("ReaderLoop", () => {
  let device: FakeDevice;
  let store: ReadingStore;
  let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
  let loop: ReaderLoop;

  beforeEach(() => {
    device = new FakeDevice();
    store = new ReadingStore();
    sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(async () => {});
    loop = new ReaderLoop(device, store, { sleep });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("tick()", () => {
    test("should open the device and wait for it to settle before reading", async () => {
      device.lines.push("45,12.5,60.2,22.1,71.8");

      const outcome = await loop.tick();

      expect(outcome).toBe("published");
      expect(device.opens).toBe(1);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
    });

    test("should publish a well-formed line", async () => {
      device.isOpen = true;
      device.lines.push("45,12.5,60.2,22.1,71.8");

      await loop.tick();

      expect(store.getLatest()).toEqual({
        angle: 45,
        distance: 12.5,
        humidity: 60.2,
        temperatureC: 22.1,
        temperatureF: 71.8,
      });
      expect(sleep).not.toHaveBeenCalled();
    });

    test("should publish each well-formed line exactly", async () => {
      device.isOpen = true;
      const samples = [
        { line: "0,0.5,10,-3.5,25.7", reading: { angle: 0, distance: 0.5, humidity: 10, temperatureC: -3.5, temperatureF: 25.7 } },
        { line: "180,399.99,99.9,40,104", reading: { angle: 180, distance: 399.99, humidity: 99.9, temperatureC: 40, temperatureF: 104 } },
        { line: "-15,2,0,0,32", reading: { angle: -15, distance: 2, humidity: 0, temperatureC: 0, temperatureF: 32 } },
      ];

      for (const { line, reading } of samples) {
        device.lines.push(line);
        expect(await loop.tick()).toBe("published");
        expect(store.getLatest()).toEqual(reading);
      }
    });

    test("should keep the previous reading when a line has three fields", async () => {
      device.isOpen = true;
      device.lines.push("45,12.5,60.2,22.1,71.8", "45,12.5,60.2");

      await loop.tick();
      const before = store.getLatest();
      const outcome = await loop.tick();

      expect(outcome).toBe("malformed");
      expect(store.getLatest()).toBe(before);
      expect(sleep).not.toHaveBeenCalled();
    });

    test("should keep the zero reading when fields fail to parse", async () => {
      device.isOpen = true;
      device.lines.push("4.5,12.5,60.2,22.1,71.8", "45,x,60.2,22.1,71.8", "45,12.5,60.2,22.1,");

      expect(await loop.tick()).toBe("malformed");
      expect(await loop.tick()).toBe("malformed");
      expect(await loop.tick()).toBe("malformed");

      expect(store.getLatest()).toEqual(ZERO);
      expect(loop.stats.malformedLines).toBe(3);
    });

    test("should log malformed lines as warnings", async () => {
      const warn = vi.spyOn(logger, "warn");
      device.isOpen = true;
      device.lines.push("45,12.5,60.2");

      await loop.tick();

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining('Expected 5 fields, got 3: "45,12.5,60.2"')
      );
    });

    test("should pause one second after a read error and keep the reading", async () => {
      device.isOpen = true;
      device.lines.push("45,12.5,60.2,22.1,71.8");
      await loop.tick();

      device.availableErrors.push(
        new SerialDeviceError("Serial port /dev/ttyFAKE0 error: EIO", {
          kind: "read",
          path: device.path,
        })
      );
      const outcome = await loop.tick();

      expect(outcome).toBe("device-error");
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
      expect(store.getLatest()).toEqual({
        angle: 45,
        distance: 12.5,
        humidity: 60.2,
        temperatureC: 22.1,
        temperatureF: 71.8,
      });
      expect(loop.stats.deviceErrors).toBe(1);
      expect(loop.stats.lastError).toBe("Serial port /dev/ttyFAKE0 error: EIO");
    });

    test("should back off with the retry delay when the port cannot be opened", async () => {
      loop = new ReaderLoop(device, store, { sleep, retryDelayMs: 250, settleMs: 10 });
      device.openError = new SerialDeviceError("Failed to open serial port /dev/ttyFAKE0: ENOENT", {
        kind: "open",
        path: device.path,
      });

      expect(await loop.tick()).toBe("device-error");
      expect(await loop.tick()).toBe("device-error");

      expect(device.opens).toBe(2);
      expect(sleep.mock.calls).toEqual([
        [250, undefined],
        [250, undefined],
      ]);
      expect(store.getLatest()).toEqual(ZERO);
    });

    test("should treat a decode failure as a device error", async () => {
      device.isOpen = true;
      device.lines.push("ignored");
      device.readErrors.push(
        new SerialDeviceError("Received bytes on /dev/ttyFAKE0 are not valid UTF-8", {
          kind: "decode",
          path: device.path,
        })
      );

      expect(await loop.tick()).toBe("device-error");
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
      expect(loop.stats.linesReceived).toBe(0);
    });

    test("should count a line dropped for length as malformed without pausing", async () => {
      const warn = vi.spyOn(logger, "warn");
      device.isOpen = true;
      device.lines.push("ignored");
      device.readErrors.push(
        new SerialDeviceError(
          "Line on /dev/ttyFAKE0 exceeded 1024 bytes without a newline and was dropped",
          { kind: "overflow", path: device.path }
        )
      );

      expect(await loop.tick()).toBe("malformed");
      expect(sleep).not.toHaveBeenCalled();
      expect(loop.stats.malformedLines).toBe(1);
      expect(loop.stats.deviceErrors).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("exceeded 1024 bytes without a newline")
      );
    });

    test("should treat unexpected exceptions from the device as device errors", async () => {
      device.isOpen = true;
      device.availableErrors.push(new Error("boom"));

      expect(await loop.tick()).toBe("device-error");
      expect(loop.stats.lastError).toBe("boom");
    });

    test("should wait for data with the poll interval when nothing is buffered", async () => {
      loop = new ReaderLoop(device, store, { sleep, pollIntervalMs: 20 });
      device.isOpen = true;

      expect(await loop.tick()).toBe("idle");
      expect(device.waits).toEqual([20]);
      expect(sleep).not.toHaveBeenCalled();
    });

    test("should reopen the device after it closes", async () => {
      device.isOpen = true;
      device.lines.push("1,1,1,1,1");
      await loop.tick();

      await device.close();
      device.lines.push("2,2,2,2,2");
      await loop.tick();

      expect(device.opens).toBe(1);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
      expect(store.getLatest().angle).toBe(2);
    });
  });

  describe("stats", () => {
    test("should count lines, publishes and failures", async () => {
      device.isOpen = true;
      device.lines.push("1,1,1,1,1", "bad", "2,2,2,2,2");
      await loop.tick();
      await loop.tick();
      await loop.tick();
      device.availableErrors.push(new Error("EIO"));
      await loop.tick();

      expect(loop.stats).toEqual({
        linesReceived: 3,
        readingsPublished: 2,
        malformedLines: 1,
        deviceErrors: 1,
        lastError: "EIO",
      });
    });
  });

  describe("run()", () => {
    test("should do nothing without a device", async () => {
      loop = new ReaderLoop(null, store, { sleep });

      await loop.run();

      expect(await loop.tick()).toBe("idle");
      expect(store.getLatest()).toEqual(ZERO);
      expect(sleep).not.toHaveBeenCalled();
    });

    test("should process lines until aborted", async () => {
      const controller = new AbortController();
      device.lines.push("10,1.5,30,20,68", "garbage", "20,2.5,31,21,69.8");
      device.onIdle = () => controller.abort();

      await loop.run(controller.signal);

      expect(store.getLatest()).toEqual({
        angle: 20,
        distance: 2.5,
        humidity: 31,
        temperatureC: 21,
        temperatureF: 69.8,
      });
      expect(loop.stats.readingsPublished).toBe(2);
      expect(loop.stats.malformedLines).toBe(1);
      expect(device.waits).toEqual([50]);
    });

    test("should pass the signal to the pauses", async () => {
      const controller = new AbortController();
      device.openError = new Error("ENOENT");
      sleep.mockImplementationOnce(async () => controller.abort());

      await loop.run(controller.signal);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
    });

    test("should stop during a retry pause when aborted", async () => {
      loop = new ReaderLoop(device, store, { retryDelayMs: 60_000 });
      const controller = new AbortController();
      device.openError = new Error("ENOENT");

      const running = loop.run(controller.signal);
      await vi.waitFor(() => expect(loop.stats.deviceErrors).toBe(1));
      controller.abort();

      await expect(running).resolves.toBeUndefined();
      expect(device.opens).toBe(1);
    });

    test("should stop during the settle pause when aborted", async () => {
      loop = new ReaderLoop(device, store, { settleMs: 60_000 });
      const controller = new AbortController();

      const running = loop.run(controller.signal);
      await vi.waitFor(() => expect(device.opens).toBe(1));
      controller.abort();

      await expect(running).resolves.toBeUndefined();
      expect(loop.stats.deviceErrors).toBe(0);
    });

    test("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await loop.run(controller.signal);

      expect(device.opens).toBe(0);
    });
  });
});
