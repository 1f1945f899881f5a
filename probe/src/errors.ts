/**
 * Error types raised by edgeprobe itself, plus the helper that turns any
 * thrown value into the kind/message pair a failed probe records.
 */

import type { ILogger } from "@edgeprobe/shared/logging";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The model answered, but the body is not a Messages API completion. */
export class ResponseFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseFormatError";
  }
}

export interface ErrorDescription {
  kind: string;
  message: string;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof Error) {
    // Subclasses that never set `name` still report their own class
    const kind = error.name && error.name !== "Error"
      ? error.name
      : error.constructor.name || "Error";
    return { kind, message: error.message };
  }
  return { kind: "Error", message: String(error) };
}

/** Log whatever stopped the CLI: bad configuration as an error, anything else as fatal. */
export function logRunFailure(log: ILogger, error: unknown): void {
  if (error instanceof ConfigError) {
    log.error(`Configuration error: ${error.message}`);
  } else {
    log.fatal("Probe run crashed", error);
  }
}
