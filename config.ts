import { existsSync, readFileSync } from "fs";
import * as os from "os";
import { SerialPort } from "serialport";
import pc from "picocolors";
import { logger } from "./logger";
import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SETTLE_MS,
} from "./reader";
import { DEFAULT_BAUD_RATE } from "./serialport";

/** Port information as returned by SerialPort.list() */
export type PortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

/** Serial path value that triggers port discovery */
export const AUTO_DETECT = "auto";

/**
 * Configuration interface for the serial connection
 */
export interface SerialConfig {
  /** Serial port path (e.g. '/dev/ttyACM0', 'COM3'), "auto", or null for no device */
  path: string | null;
  /** Baud rate, must match the firmware */
  baudRate: number;
}

/**
 * Timing of the reader loop
 */
export interface ReaderConfig {
  /** Pause after a device-level error */
  retryDelayMs: number;
  /** Pause after opening the port */
  settleMs: number;
  /** Idle poll interval */
  pollIntervalMs: number;
}

/**
 * HTTP server settings
 */
export interface ServerConfig {
  port: number;
  host: string;
  /** Directory holding index.html and other static files */
  publicDir: string;
}

/**
 * Main application configuration interface
 */
export interface AppConfig {
  serial: SerialConfig;
  reader: ReaderConfig;
  server: ServerConfig;
}

/** Path to the configuration file */
export const CONFIG_PATH = "./config.json";

/**
 * Builds the built-in default configuration
 */
export function defaultConfig(): AppConfig {
  return {
    serial: {
      path: null,
      baudRate: DEFAULT_BAUD_RATE,
    },
    reader: {
      retryDelayMs: DEFAULT_RETRY_DELAY_MS,
      settleMs: DEFAULT_SETTLE_MS,
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    },
    server: {
      port: 5001,
      host: "0.0.0.0",
      publicDir: "./public",
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isPortNumber(value: unknown): value is number {
  return isNonNegativeInteger(value) && value <= 65535;
}

/**
 * Shape of config.json: every section and key is optional
 */
export interface ConfigFile {
  serial?: Partial<SerialConfig>;
  reader?: Partial<ReaderConfig>;
  server?: Partial<ServerConfig>;
}

/**
 * Validates the serial section of config.json
 * @throws {Error} If the section is invalid
 */
function validateSerialConfig(serial: Record<string, unknown>): void {
  if (
    serial.path !== undefined &&
    serial.path !== null &&
    (typeof serial.path !== "string" || serial.path.length === 0)
  ) {
    throw new Error(`Invalid serial.path: ${JSON.stringify(serial.path)}`);
  }
  if (
    serial.baudRate !== undefined &&
    (!isNonNegativeInteger(serial.baudRate) || serial.baudRate === 0)
  ) {
    throw new Error(`Invalid serial.baudRate: ${JSON.stringify(serial.baudRate)}`);
  }
}

/**
 * Validates the reader section of config.json
 * @throws {Error} If the section is invalid
 */
function validateReaderConfig(reader: Record<string, unknown>): void {
  for (const key of ["retryDelayMs", "settleMs", "pollIntervalMs"]) {
    if (reader[key] !== undefined && !isNonNegativeInteger(reader[key])) {
      throw new Error(`Invalid reader.${key}: ${JSON.stringify(reader[key])}`);
    }
  }
}

/**
 * Validates the server section of config.json
 * @throws {Error} If the section is invalid
 */
function validateServerConfig(server: Record<string, unknown>): void {
  if (server.port !== undefined && !isPortNumber(server.port)) {
    throw new Error(`Invalid server.port: ${JSON.stringify(server.port)}`);
  }
  for (const key of ["host", "publicDir"]) {
    if (server[key] !== undefined && typeof server[key] !== "string") {
      throw new Error(`Invalid server.${key}: ${JSON.stringify(server[key])}`);
    }
  }
}

/**
 * Validates the configuration object structure and values
 * @param config - The parsed contents of config.json
 * @throws {Error} If the configuration is invalid
 */
export function validateConfig(config: unknown): asserts config is ConfigFile {
  if (!isRecord(config)) {
    throw new Error("Config must be a JSON object");
  }

  const sections = [
    ["serial", validateSerialConfig],
    ["reader", validateReaderConfig],
    ["server", validateServerConfig],
  ] as const;

  for (const [name, validate] of sections) {
    const section = config[name];
    if (section === undefined) {
      continue;
    }
    if (!isRecord(section)) {
      throw new Error(`Config section '${name}' must be an object`);
    }
    validate(section);
  }
}

/**
 * Reads an integer environment variable
 * @throws {Error} If the variable is set but not a valid integer
 */
function readIntegerEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  isValid: (value: number) => boolean
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || !isValid(value)) {
    throw new Error(`Invalid ${name}: "${raw}"`);
  }
  return value;
}

/**
 * Applies environment variable overrides on top of a configuration
 * @throws {Error} If a numeric environment variable is malformed
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const serialPath = env.SERIAL_PATH?.trim();
  const baudRate = readIntegerEnv(env, "SERIAL_BAUD_RATE", (v) => v > 0);
  const port = readIntegerEnv(env, "PORT", (v) => isPortNumber(v));

  return {
    serial: {
      path: serialPath ? serialPath : config.serial.path,
      baudRate: baudRate ?? config.serial.baudRate,
    },
    reader: { ...config.reader },
    server: {
      port: port ?? config.server.port,
      host: env.HOST?.trim() || config.server.host,
      publicDir: env.PUBLIC_DIR?.trim() || config.server.publicDir,
    },
  };
}

/**
 * Loads the application configuration
 * Defaults, then config.json if present and valid, then environment overrides.
 * An invalid config.json is reported and ignored.
 * @param path - Location of the configuration file
 * @param env - Environment to read overrides from
 * @returns The resolved configuration
 * @throws {Error} If an environment override is malformed
 */
export function loadConfig(
  path: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const defaults = defaultConfig();
  let config = defaults;

  if (existsSync(path)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
      validateConfig(parsed);
      config = {
        serial: { ...defaults.serial, ...parsed.serial },
        reader: { ...defaults.reader, ...parsed.reader },
        server: { ...defaults.server, ...parsed.server },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`${path} is invalid: ${message}`);
      logger.log("Falling back to default configuration");
    }
  }

  return applyEnvOverrides(config, env);
}

/**
 * Serial port with a likelihood rating of being the sensor board
 */
export interface ScoredPort {
  port: PortInfo;
  /** Likelihood score (0-100) */
  score: number;
  /** Human-readable reason for the score */
  reason: string;
}

/** USB vendor ids of common microcontroller boards and USB-serial bridges */
const KNOWN_VENDORS: { [vendorId: string]: { score: number; label: string } } = {
  "2341": { score: 80, label: "Arduino" },
  "2a03": { score: 80, label: "Arduino (arduino.org)" },
  "1a86": { score: 70, label: "WCH CH340" },
  "0403": { score: 65, label: "FTDI chip" },
  "10c4": { score: 65, label: "Silicon Labs CP210x" },
  "239a": { score: 60, label: "Adafruit" },
};

/**
 * Scores a serial port based on likelihood of being the sensor board
 * @param port - Port information from SerialPort.list()
 * @param platform - Operating system, defaults to the current one
 * @returns Scored port with likelihood rating and reasoning
 */
export function scorePort(port: PortInfo, platform: string = os.platform()): ScoredPort {
  let score = 0;
  const reasons: string[] = [];

  const vendor = KNOWN_VENDORS[port.vendorId?.toLowerCase() ?? ""];
  if (vendor) {
    score += vendor.score;
    reasons.push(vendor.label);
  } else {
    score -= 20;
    reasons.push("Unknown chip");
  }

  const path = port.path.toLowerCase();
  if (path.includes("usbmodem") || path.includes("ttyacm")) {
    score += 15;
    reasons.push("USB CDC device");
  } else if (path.includes("usbserial") || path.includes("ttyusb")) {
    score += 10;
    reasons.push("USB-serial device");
  }

  const manufacturer = port.manufacturer?.toLowerCase() ?? "";
  if (manufacturer.includes("arduino")) {
    score += 10;
    reasons.push("Arduino manufacturer");
  }

  if (path.includes("bluetooth")) {
    score -= 50;
    reasons.push("Bluetooth device (excluded)");
  }

  if (path.includes("debug") || (platform === "darwin" && path.includes("/dev/tty."))) {
    score -= 30;
    reasons.push("Debug or dial-in port");
  }

  score = Math.min(100, Math.max(0, score));

  return {
    port,
    score,
    reason: reasons.join(", "),
  };
}

/**
 * Lists serial ports ranked by likelihood of being the sensor board
 * @param list - Port lister, defaults to SerialPort.list
 * @returns Scored ports, best first
 */
export async function rankSerialPorts(
  list: () => Promise<PortInfo[]> = () => SerialPort.list()
): Promise<ScoredPort[]> {
  const ports = await list();
  return ports.map((port) => scorePort(port)).sort((a, b) => b.score - a.score);
}

/**
 * Picks the most likely sensor board among the connected serial ports
 * @param list - Port lister, defaults to SerialPort.list
 * @returns The port path, or null if no candidate has a positive score
 */
export async function autoDetectSerialPort(
  list?: () => Promise<PortInfo[]>
): Promise<string | null> {
  const ranked = await rankSerialPorts(list);
  const best = ranked[0];

  if (!best || best.score <= 0) {
    logger.warn("No serial device detected");
    return null;
  }

  logger.log(
    `Detected serial device ${pc.cyan(best.port.path)} (${best.reason}, score ${best.score})`
  );
  return best.port.path;
}
