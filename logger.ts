/**
 * Logger utility that respects the SILENT and DEBUG environment variables
 * When SILENT=true, all console output is suppressed
 * When DEBUG=true, debug output (raw serial lines, parsed readings) is shown
 */

import pc from "picocolors";

const isSilent = process.env.SILENT === "true";
const isDebug = process.env.DEBUG === "true";

/**
 * Silent console wrapper that respects the SILENT environment variable
 */
export const logger = {
  log: (...args: unknown[]) => {
    if (!isSilent) {
      console.log(...args);
    }
  },

  error: (...args: unknown[]) => {
    if (!isSilent) {
      console.error(...args);
    }
  },

  warn: (...args: unknown[]) => {
    if (!isSilent) {
      console.warn(...args);
    }
  },

  info: (...args: unknown[]) => {
    if (!isSilent) {
      console.info(...args);
    }
  },

  /**
   * Verbose output, only shown with DEBUG=true
   */
  debug: (...args: unknown[]) => {
    if (!isSilent && isDebug) {
      console.debug(pc.dim("[debug]"), ...args);
    }
  },
};
