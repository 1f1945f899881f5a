/**
 * Connectivity Checker
 *
 * Probes each region/model pair twice, once against the default regional
 * endpoint and once through the CDN proxy, strictly one call at a time.
 * Every failure becomes a ProbeFailure; nothing here retries or throws
 * out of a probe.
 */

import type { ILogger } from "@edgeprobe/shared/logging";
import { buildRequestBody, parseInvokeResponse, type InferenceClient, type InferenceClientFactory } from "./bedrock.js";
import { describeError } from "./errors.js";
import { createComponentLogger } from "./logging.js";
import { listPairs } from "./models.js";
import { formatReport } from "./report.js";
import type {
  ModelSpec,
  ProbeFailure,
  ProbeMode,
  ProbeObserver,
  ProbeResult,
  ProbeSuccess,
  RegionModelTable,
  RunResults
} from "./types.js";

export const DEFAULT_DELAY_MS = 300;
export const DEFAULT_MAX_TOKENS = 50;
export const DEFAULT_PROMPT = "Hello";

export interface ConnectivityCheckerOptions {
  clientFactory: InferenceClientFactory;
  /** CDN URL used for proxy-mode probes */
  proxyEndpoint: string;
  /** Pause after every probe (default: 300) */
  delayMs?: number;
  maxTokens?: number;
  prompt?: string;
  observer?: ProbeObserver;
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds clock used to time the invocation */
  now?: () => number;
  logger?: ILogger;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms));

export class ConnectivityChecker {
  private clientFactory: InferenceClientFactory;
  private proxyEndpoint: string;
  private delayMs: number;
  private maxTokens: number;
  private prompt: string;
  private observer: ProbeObserver;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private log: ILogger;

  constructor(options: ConnectivityCheckerOptions) {
    this.clientFactory = options.clientFactory;
    this.proxyEndpoint = options.proxyEndpoint;
    this.delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.observer = options.observer ?? {};
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger ?? createComponentLogger("checker");
  }

  /** Endpoint override for a mode; undefined leaves the SDK default in place. */
  endpointFor(useProxy: boolean): string | undefined {
    return useProxy ? this.proxyEndpoint : undefined;
  }

  async probe(region: string, model: ModelSpec, useProxy: boolean): Promise<ProbeResult> {
    const mode: ProbeMode = useProxy ? "proxy" : "direct";
    const endpoint = this.endpointFor(useProxy);
    this.log.debug("Probe starting", { region, modelId: model.id, mode, endpoint: endpoint ?? "default" });

    let client: InferenceClient | undefined;
    let result: ProbeResult;

    try {
      client = this.clientFactory({ region, endpoint });
      const body = JSON.stringify(buildRequestBody({ maxTokens: this.maxTokens, prompt: this.prompt }));

      const started = this.now();
      const response = await client.invoke({ modelId: model.id, body });
      const elapsedSeconds = (this.now() - started) / 1000;

      const completion = parseInvokeResponse(response.body);
      const passed: ProbeSuccess = {
        success: true,
        statusCode: response.statusCode,
        elapsedSeconds,
        tokenUsage: Object.freeze({ ...completion.usage }),
        responseSnippet: completion.text
      };
      result = Object.freeze(passed);
      this.log.info("Probe passed", { region, modelId: model.id, mode, elapsedSeconds });
    } catch (error) {
      const { kind, message } = describeError(error);
      const failed: ProbeFailure = { success: false, errorKind: kind, errorMessage: message };
      result = Object.freeze(failed);
      this.log.info("Probe failed", { region, modelId: model.id, mode, errorKind: kind });
    } finally {
      this.destroyClient(client, region, mode);
    }

    return result;
  }

  private destroyClient(client: InferenceClient | undefined, region: string, mode: ProbeMode): void {
    try {
      client?.destroy?.();
    } catch (error) {
      this.log.warn("Client cleanup failed", { region, mode, error: describeError(error).message });
    }
  }

  async runAll(table: RegionModelTable): Promise<RunResults> {
    const pairs = listPairs(table);
    const results: RunResults = { pairs, direct: new Map(), proxy: new Map() };

    this.log.info("Run starting", { pairs: pairs.length, probes: pairs.length * 2 });

    for (const [i, pair] of pairs.entries()) {
      const info = { index: i + 1, total: pairs.length, region: pair.region, model: pair.model };
      this.observer.pairStarted?.(info);

      const direct = await this.probe(pair.region, pair.model, false);
      results.direct.set(pair.key, direct);
      this.observer.probeFinished?.({ ...info, mode: "direct", result: direct });
      await this.sleep(this.delayMs);

      const proxy = await this.probe(pair.region, pair.model, true);
      results.proxy.set(pair.key, proxy);
      this.observer.probeFinished?.({ ...info, mode: "proxy", result: proxy });
      await this.sleep(this.delayMs);
    }

    return results;
  }

  report(results: RunResults): string[] {
    return formatReport(results);
  }
}
