/**
 * Sensor line parser
 * Centralized parsing logic for the microcontroller's comma-separated output:
 *   angle,distance,humidity,temperatureC,temperatureF
 */

/** Number of comma-separated fields in a well-formed line */
export const FIELD_COUNT = 5;

/** Line terminator sent by the microcontroller */
const NEWLINE = 0x0a;

/**
 * One complete, validated sample of the five sensor fields
 */
export interface Reading {
  /** Servo angle in degrees */
  angle: number;
  /** Measured distance */
  distance: number;
  /** Relative humidity in percent */
  humidity: number;
  /** Temperature in Celsius */
  temperatureC: number;
  /** Temperature in Fahrenheit */
  temperatureF: number;
}

/** Reading published before the first successful parse */
export const ZERO_READING: Readonly<Reading> = Object.freeze({
  angle: 0,
  distance: 0,
  humidity: 0,
  temperatureC: 0,
  temperatureF: 0,
});

/**
 * Result of parsing a single line
 */
export type ParsedLine =
  | { valid: true; reading: Reading }
  | { valid: false; error: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Float fields in wire order, after the angle */
const FLOAT_FIELDS = ["distance", "humidity", "temperatureC", "temperatureF"] as const;

/**
 * Parses an integer token
 * @returns The value, or null if the token is not an integer literal
 */
function parseIntegerToken(token: string): number | null {
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parses a floating-point token
 * @returns The value, or null if the token is not a finite decimal literal
 */
function parseFloatToken(token: string): number | null {
  const trimmed = token.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parses one decoded line into a Reading
 * Expected format: angle,distance,humidity,temperatureC,temperatureF
 * @param line - Decoded text line, with or without its line terminator
 * @returns Parsed reading, or the reason the line was rejected
 */
export function parseReadingLine(line: string): ParsedLine {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { valid: false, error: "Empty line" };
  }

  const tokens = trimmed.split(",");
  if (tokens.length !== FIELD_COUNT) {
    return {
      valid: false,
      error: `Expected ${FIELD_COUNT} fields, got ${tokens.length}: "${trimmed}"`,
    };
  }

  const angle = parseIntegerToken(tokens[0]);
  if (angle === null) {
    return { valid: false, error: `Invalid angle: "${tokens[0]}"` };
  }

  const values: number[] = [];
  for (let i = 0; i < FLOAT_FIELDS.length; i++) {
    const token = tokens[i + 1];
    const value = parseFloatToken(token);
    if (value === null) {
      return { valid: false, error: `Invalid ${FLOAT_FIELDS[i]}: "${token}"` };
    }
    values.push(value);
  }

  const [distance, humidity, temperatureC, temperatureF] = values;
  return {
    valid: true,
    reading: { angle, distance, humidity, temperatureC, temperatureF },
  };
}

/**
 * Longest line kept while waiting for its newline. A well-formed reading is
 * under 64 bytes; anything past this is noise, usually a baud rate mismatch.
 */
export const MAX_LINE_BYTES = 1024;

/**
 * Framing state carried between chunks
 */
export interface LineFrame {
  /** Bytes received so far without a terminator */
  buffer: Buffer;
  /** True while skipping the rest of an overlong line */
  discarding: boolean;
}

/**
 * Processes a chunk of incoming serial bytes and extracts complete lines
 * Handles partial lines and returns both the complete lines and the remaining buffer.
 * Works on bytes so a multi-byte character split across chunks stays intact.
 * A line longer than maxLineBytes is dropped up to its newline and counted in
 * `overflowed`, so the pending buffer never grows past that limit.
 * @param buffer - Bytes received so far without a terminator
 * @param chunk - Newly received bytes
 * @returns Complete non-empty lines (without the newline), the updated buffer
 *   and the number of lines dropped for length
 */
export function splitLines(
  buffer: Buffer,
  chunk: Buffer,
  options: { discarding?: boolean; maxLineBytes?: number } = {}
): LineFrame & { lines: Buffer[]; overflowed: number } {
  const maxLineBytes = options.maxLineBytes ?? MAX_LINE_BYTES;
  let discarding = options.discarding ?? false;
  let pending = buffer.length > 0 ? Buffer.concat([buffer, chunk]) : chunk;
  const lines: Buffer[] = [];
  let overflowed = 0;

  let index = pending.indexOf(NEWLINE);
  while (index !== -1) {
    const line = pending.subarray(0, index);
    if (discarding) {
      // Tail of a line already counted
      discarding = false;
    } else if (line.length > maxLineBytes) {
      overflowed++;
    } else if (line.length > 0) {
      lines.push(Buffer.from(line));
    }
    pending = pending.subarray(index + 1);
    index = pending.indexOf(NEWLINE);
  }

  if (discarding) {
    pending = pending.subarray(pending.length);
  } else if (pending.length > maxLineBytes) {
    overflowed++;
    discarding = true;
    pending = pending.subarray(pending.length);
  }

  return {
    lines,
    buffer: Buffer.from(pending),
    discarding,
    overflowed,
  };
}
