/**
 * Structured Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@edgeprobe/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "info",
 *   component: "probe",
 *   transports: [new ConsoleTransport()]
 * });
 *
 * logger.child({ component: "probe.checker" }).info("Probe passed", { region: "us-west-2" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  initLogger,
  getLogger
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type ConsoleStream,
  type FileTransportOptions
} from "./transports/index.js";
