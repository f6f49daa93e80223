/**
 * Transport-level failure categories for the serial device
 * - open: the port could not be opened (missing device, permissions, busy)
 * - read: the port reported an error or had nothing to read
 * - decode: a received line is not valid UTF-8
 * - overflow: a line ran past the length limit and was dropped
 */
export type SerialErrorKind = "open" | "read" | "decode" | "overflow";

/**
 * Error raised by the serial device.
 * The reader loop backs off after these, except for overflow, which it counts
 * as a malformed line.
 */
export class SerialDeviceError extends Error {
  readonly kind: SerialErrorKind;
  readonly path: string;

  constructor(
    message: string,
    options: { kind: SerialErrorKind; path: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "SerialDeviceError";
    this.kind = options.kind;
    this.path = options.path;
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
