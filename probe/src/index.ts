/**
 * edgeprobe CLI
 *
 * Usage:
 *   npm run probe -- --endpoint https://d111111abcdef8.cloudfront.net
 *   npm run probe -- --regions us-west-2,us-east-1 --quiet
 *
 * Probe failures are reported, not treated as process failures: a run that
 * completes exits 0. Only configuration errors and crashes exit 1.
 */

import { nanoid } from "nanoid";
import { createBedrockClient } from "./bedrock.js";
import { ConnectivityChecker } from "./checker.js";
import { clearEndpointOverrides, HELP_TEXT, loadEnvFile, parseCliArgs, resolveProbeConfig } from "./config.js";
import { logRunFailure } from "./errors.js";
import { createComponentLogger, initProbeLogging, shutdownProbeLogging } from "./logging.js";
import { countModels, loadRegionModelTable, selectRegions } from "./models.js";
import { formatPairHeading, formatProbeOutcome, renderBanner, RULE_WIDTH } from "./report.js";
import type { ProbeObserver } from "./types.js";

const consoleObserver: ProbeObserver = {
  pairStarted(event) {
    console.log(`\n${formatPairHeading(event.index, event.model, event.region)}`);
  },
  probeFinished(event) {
    for (const line of formatProbeOutcome(event.mode, event.result)) {
      console.log(line);
    }
  }
};

async function main(argv: string[]): Promise<number> {
  loadEnvFile();

  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const config = resolveProbeConfig(options, process.env);
  initProbeLogging({ minLevel: config.logLevel, logDir: config.logDir, correlationId: nanoid(10) });
  const log = createComponentLogger("cli");

  const overrides = clearEndpointOverrides(process.env);
  if (Object.keys(overrides).length > 0) {
    log.warn("Ignoring endpoint overrides from the environment; direct probes use the regional endpoint", overrides);
  }

  const table = selectRegions(loadRegionModelTable(config.modelsFile), config.regions);
  log.debug("Model table loaded", { regions: table.size, models: countModels(table) });

  for (const line of renderBanner(config.proxyEndpoint, new Date())) {
    console.log(line);
  }
  console.log("\nRunning checks...");
  console.log("=".repeat(RULE_WIDTH));

  const checker = new ConnectivityChecker({
    clientFactory: createBedrockClient,
    proxyEndpoint: config.proxyEndpoint,
    delayMs: config.delayMs,
    maxTokens: config.maxTokens,
    prompt: config.prompt,
    observer: config.verbose ? consoleObserver : undefined
  });

  const results = await checker.runAll(table);
  for (const line of checker.report(results)) {
    console.log(line);
  }

  log.info("Run complete", { pairs: results.pairs.length });
  return 0;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (err) {
  logRunFailure(createComponentLogger("cli"), err);
  process.exitCode = 1;
} finally {
  await shutdownProbeLogging();
}
