import pc from "picocolors";
import { AUTO_DETECT, autoDetectSerialPort, type AppConfig } from "./config";
import { describeError } from "./errors";
import { logger } from "./logger";
import { ReaderLoop } from "./reader";
import { SerialLineDevice, type LineDevice, type PortFactory } from "./serialport";
import { createApp, startServer, stopServer, type HttpServer } from "./server";
import { ReadingStore } from "./snapshot";

/**
 * Handles to everything the bridge started
 */
export interface RunningApp {
  config: AppConfig;
  store: ReadingStore;
  device: LineDevice | null;
  reader: ReaderLoop;
  server: HttpServer;
  /** Stops the reader, closes the port and the HTTP server */
  shutdown(): Promise<void>;
}

/**
 * Overrides for collaborators that touch hardware
 */
export interface InitializeOptions {
  createPort?: PortFactory;
}

/**
 * Resolves the configured serial path, running discovery for "auto"
 * @returns The device path, or null when no device is configured or found
 */
export async function resolveSerialPath(config: AppConfig): Promise<string | null> {
  const { path } = config.serial;
  if (path === null) {
    logger.log(`${pc.yellow("No serial device configured")} - serving zero readings`);
    return null;
  }
  if (path === AUTO_DETECT) {
    logger.log(`${pc.yellow("Auto-detecting")} serial device...`);
    return autoDetectSerialPort();
  }
  return path;
}

/**
 * Initialize the bridge
 * Opens the serial device once for this process, starts the reader loop in the
 * background and the HTTP server in front of the shared snapshot.
 * If the server cannot listen, the reader is stopped and the port closed
 * before the error is rethrown.
 */
export async function initializeApp(
  config: AppConfig,
  options: InitializeOptions = {}
): Promise<RunningApp> {
  const path = await resolveSerialPath(config);
  const device = path
    ? new SerialLineDevice({
        path,
        baudRate: config.serial.baudRate,
        createPort: options.createPort,
      })
    : null;

  const store = new ReadingStore();
  const reader = new ReaderLoop(device, store, config.reader);

  const controller = new AbortController();
  const running = reader.run(controller.signal).catch((error) => {
    logger.error(`${pc.red("Reader loop stopped:")} ${describeError(error)}`);
  });

  const app = createApp({
    store,
    reader,
    device,
    publicDir: config.server.publicDir,
  });
  let server: HttpServer;
  try {
    server = await startServer(app, config.server);
  } catch (error) {
    controller.abort();
    await running;
    if (device) {
      await device.close();
    }
    throw error;
  }

  return {
    config,
    store,
    device,
    reader,
    server,
    async shutdown() {
      controller.abort();
      await running;
      if (device) {
        await device.close();
      }
      await stopServer(server);
    },
  };
}
