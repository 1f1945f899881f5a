/**
 * Logging Setup for the Probe CLI
 *
 * Console output goes to stderr so the report on stdout stays clean.
 * File output (JSON lines) is enabled only when a log directory is given.
 */

import {
  initLogger,
  Logger,
  ConsoleTransport,
  FileTransport,
  LOG_LEVELS,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@edgeprobe/shared/logging";

export interface LoggingOptions {
  /** Console level (default: "info") */
  minLevel?: LogLevel;
  /** When set, debug-and-above entries are also written here */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Run identifier stamped on every entry */
  correlationId?: string;
}

let logger: Logger | null = null;

export function initProbeLogging(options: LoggingOptions = {}): Logger {
  const consoleLevel = options.minLevel || "info";
  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel: consoleLevel, colors: options.colors })
  ];

  let minLevel: LogLevel = consoleLevel;
  if (options.logDir) {
    transports.push(new FileTransport({ minLevel: "debug", logDir: options.logDir, filename: "edgeprobe" }));
    if (LOG_LEVELS.debug < LOG_LEVELS[minLevel]) minLevel = "debug";
  }

  logger = initLogger({
    minLevel,
    component: "probe",
    correlationId: options.correlationId,
    transports
  });

  return logger;
}

/**
 * Get the probe logger. Auto-initializes with defaults if accessed before
 * an explicit init.
 */
export function getProbeLogger(): Logger {
  return logger ?? initProbeLogging();
}

export function createComponentLogger(component: string): ILogger {
  return getProbeLogger().child({ component: `probe.${component}` });
}

export async function shutdownProbeLogging(): Promise<void> {
  if (!logger) return;
  await logger.close();
  logger = null;
}
