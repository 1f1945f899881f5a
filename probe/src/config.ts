/**
 * Probe Configuration
 *
 * Environment variables (optionally from a project-root .env) with CLI
 * flags layered on top. Everything is validated up front; a bad value is a
 * ConfigError before any probe runs.
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@edgeprobe/shared/logging";
import { DEFAULT_DELAY_MS, DEFAULT_MAX_TOKENS, DEFAULT_PROMPT } from "./checker.js";
import { ConfigError } from "./errors.js";
import { REGION_PATTERN } from "./models.js";

const moduleDir = dirname(fileURLToPath(import.meta.url));

export function loadEnvFile(path: string = resolve(moduleDir, "../../.env")): void {
  loadDotenv({ path });
}

/** SDK variables that would redirect clients built without an explicit endpoint */
export const ENDPOINT_OVERRIDE_VARS = ["AWS_ENDPOINT_URL_BEDROCK_RUNTIME", "AWS_ENDPOINT_URL"] as const;

/**
 * Remove endpoint overrides from the environment so direct probes reach the
 * regional endpoint. Returns what was removed.
 */
export function clearEndpointOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const removed: Record<string, string> = {};
  for (const name of ENDPOINT_OVERRIDE_VARS) {
    const value = env[name];
    if (value !== undefined) {
      removed[name] = value;
      delete env[name];
    }
  }
  return removed;
}

// ============================================
// CLI ARGUMENTS
// ============================================

export interface CliOptions {
  endpoint?: string;
  modelsFile?: string;
  regions?: string;
  delay?: string;
  quiet: boolean;
  help: boolean;
}

const VALUE_FLAGS = {
  "--endpoint": "endpoint",
  "--models": "modelsFile",
  "--regions": "regions",
  "--delay": "delay"
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { quiet: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigError(`${arg} needs a value`);
      }
      options[VALUE_FLAGS[arg]] = value;
      i++;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

export const HELP_TEXT = `
edgeprobe: Bedrock direct vs. CDN proxy connectivity check

Usage: npm run probe -- [options]

Options:
  --endpoint <url>       CDN proxy endpoint (env: EDGEPROBE_PROXY_ENDPOINT)
  --models <path>        JSON region/model table (env: EDGEPROBE_MODELS_FILE)
  --regions <a,b>        Only check these regions (env: EDGEPROBE_REGIONS)
  --delay <ms>           Pause after each probe, default ${DEFAULT_DELAY_MS} (env: EDGEPROBE_DELAY_MS)
  -q, --quiet            Skip per-probe progress output
  -h, --help             Show this help message

Other environment:
  EDGEPROBE_MAX_TOKENS   Request token budget (default ${DEFAULT_MAX_TOKENS})
  EDGEPROBE_PROMPT       Prompt text (default "${DEFAULT_PROMPT}")
  LOG_LEVEL              Console log level (default info)
  LOG_DIR                Also write JSON-lines logs to this directory
`;

// ============================================
// RESOLVED CONFIG
// ============================================

export interface ProbeConfig {
  proxyEndpoint: string;
  /** Undefined means the built-in table */
  modelsFile?: string;
  /** Undefined means every region in the table */
  regions?: string[];
  delayMs: number;
  maxTokens: number;
  prompt: string;
  verbose: boolean;
  logLevel: LogLevel;
  logDir?: string;
}

function parseEndpoint(raw: string | undefined): string {
  if (!raw || !raw.trim()) {
    throw new ConfigError("No proxy endpoint. Set EDGEPROBE_PROXY_ENDPOINT or pass --endpoint <url>");
  }
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ConfigError(`Proxy endpoint is not a URL: ${raw}`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`Proxy endpoint must be http(s): ${raw}`);
  }
  return raw.trim().replace(/\/+$/, "");
}

function parseInteger(raw: string | undefined, name: string, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function parseRegions(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const regions = raw.split(",").map(r => r.trim()).filter(Boolean);
  const invalid = regions.filter(r => !REGION_PATTERN.test(r));
  if (invalid.length > 0) {
    throw new ConfigError(`Not a region identifier: ${invalid.join(", ")}`);
  }
  return regions.length > 0 ? regions : undefined;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) return "info";
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent (got "${raw}")`);
  }
  return level;
}

export function resolveProbeConfig(options: CliOptions, env: NodeJS.ProcessEnv): ProbeConfig {
  const prompt = env.EDGEPROBE_PROMPT?.trim();
  return {
    proxyEndpoint: parseEndpoint(options.endpoint ?? env.EDGEPROBE_PROXY_ENDPOINT),
    modelsFile: options.modelsFile ?? (env.EDGEPROBE_MODELS_FILE || undefined),
    regions: parseRegions(options.regions ?? env.EDGEPROBE_REGIONS),
    delayMs: parseInteger(options.delay ?? env.EDGEPROBE_DELAY_MS, "Delay", DEFAULT_DELAY_MS, 0),
    maxTokens: parseInteger(env.EDGEPROBE_MAX_TOKENS, "EDGEPROBE_MAX_TOKENS", DEFAULT_MAX_TOKENS, 1),
    prompt: prompt || DEFAULT_PROMPT,
    verbose: !options.quiet,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logDir: env.LOG_DIR || undefined
  };
}
