import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import type { Server as NetServer } from "net";
import { Gauge, Registry } from "prom-client";
import pc from "picocolors";
import { describeError } from "./errors";
import { logger } from "./logger";
import type { ReaderLoop } from "./reader";
import type { LineDevice } from "./serialport";
import type { ReadingStore } from "./snapshot";

/** Running HTTP server as returned by @hono/node-server */
export type HttpServer = ReturnType<typeof serve>;

/**
 * Collaborators the HTTP layer reads from
 */
export interface AppDependencies {
  store: ReadingStore;
  reader?: ReaderLoop | null;
  device?: LineDevice | null;
  /** Directory holding index.html */
  publicDir?: string;
}

/**
 * Prometheus metrics for the latest reading and the reader loop
 */
function createMetrics(register: Registry) {
  const readingGauge = new Gauge({
    name: "sensor_reading",
    help: "Latest sensor reading, one series per field",
    labelNames: ["field"],
    registers: [register],
  });

  const lastUpdateGauge = new Gauge({
    name: "sensor_reading_last_update_seconds",
    help: "Seconds since the last reading was published",
    registers: [register],
  });

  const readerGauge = new Gauge({
    name: "sensor_reader_events",
    help: "Reader loop counters since start",
    labelNames: ["event"],
    registers: [register],
  });

  const deviceOpenGauge = new Gauge({
    name: "sensor_device_open",
    help: "Serial device status (1=open, 0=closed or not configured)",
    registers: [register],
  });

  return { readingGauge, lastUpdateGauge, readerGauge, deviceOpenGauge };
}

/**
 * Builds the Hono application
 * @returns App exposing /data, /health, /metrics and the static page
 */
export function createApp(deps: AppDependencies): Hono {
  const { store } = deps;
  const reader = deps.reader ?? null;
  const device = deps.device ?? null;

  const app = new Hono();
  const register = new Registry();
  const metrics = createMetrics(register);

  app.use("*", cors());

  /**
   * GET /data - Latest reading
   * Returns the zero reading until the first line has been parsed; never errors
   */
  app.get("/data", (c) => {
    logger.debug(`${pc.gray("[GET]")} /data`);
    return c.json(store.getLatest());
  });

  /**
   * GET /health - Device status and reader statistics
   */
  app.get("/health", (c) => {
    logger.log(`${pc.gray("[GET]")} /health`);
    const { updatedAt } = store.getSnapshot();

    return c.json({
      status: "ok",
      device: {
        configured: device !== null,
        path: device?.path ?? null,
        open: device?.isOpen ?? false,
      },
      lastUpdate: updatedAt ? updatedAt.toISOString() : null,
      stats: reader ? reader.stats : null,
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /metrics - Prometheus metrics endpoint
   */
  app.get("/metrics", async (c) => {
    logger.log(`${pc.gray("[GET]")} /metrics`);
    try {
      metrics.readingGauge.reset();
      metrics.lastUpdateGauge.reset();
      metrics.readerGauge.reset();

      const { reading, updatedAt } = store.getSnapshot();
      for (const [field, value] of Object.entries(reading)) {
        metrics.readingGauge.set({ field }, value);
      }

      if (updatedAt) {
        metrics.lastUpdateGauge.set((Date.now() - updatedAt.getTime()) / 1000);
      }

      if (reader) {
        const stats = reader.stats;
        metrics.readerGauge.set({ event: "line_received" }, stats.linesReceived);
        metrics.readerGauge.set({ event: "reading_published" }, stats.readingsPublished);
        metrics.readerGauge.set({ event: "malformed_line" }, stats.malformedLines);
        metrics.readerGauge.set({ event: "device_error" }, stats.deviceErrors);
      }

      metrics.deviceOpenGauge.set(device?.isOpen ? 1 : 0);

      const body = await register.metrics();
      c.header("Content-Type", register.contentType);
      return c.text(body);
    } catch (err) {
      const message = describeError(err);
      logger.log(`${pc.gray("[GET]")} /metrics - ${pc.red("Error:")} ${message}`);
      c.status(500);
      return c.text(`# Error: ${message}`);
    }
  });

  // Static file serving, "/" resolves to index.html
  app.use("/*", serveStatic({ root: deps.publicDir ?? "./public" }));

  return app;
}

/**
 * Starts listening
 * @returns The underlying Node HTTP server, once it is listening
 * @throws The listen error, e.g. EADDRINUSE
 */
export function startServer(
  app: Hono,
  options: { port: number; host: string }
): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const server = serve({
      fetch: app.fetch,
      port: options.port,
      hostname: options.host,
    });
    const listener: NetServer = server;

    const onError = (err: Error) => {
      listener.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      listener.off("error", onError);
      resolve(server);
    };
    listener.once("error", onError);
    listener.once("listening", onListening);
  });
}

/**
 * Stops accepting connections and waits for the server to close
 */
export function stopServer(server: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err?: Error) => (err ? reject(err) : resolve()));
  });
}
