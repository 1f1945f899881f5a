import { describe, it, expect, vi } from "vitest";

vi.mock("./logging.js", () => ({
  createComponentLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { clearEndpointOverrides, parseCliArgs, resolveProbeConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const BASE_ENV = { EDGEPROBE_PROXY_ENDPOINT: "https://cdn.example.test/" };

describe("parseCliArgs", () => {
  it("defaults to verbose, no help", () => {
    expect(parseCliArgs([])).toEqual({ quiet: false, help: false });
  });

  it("reads value flags and switches", () => {
    expect(parseCliArgs(["--endpoint", "https://a.test", "--regions", "us-west-2", "--delay", "0", "-q"])).toEqual({
      endpoint: "https://a.test",
      regions: "us-west-2",
      delay: "0",
      quiet: true,
      help: false
    });
  });

  it("maps --models to modelsFile", () => {
    expect(parseCliArgs(["--models", "./mine.json"]).modelsFile).toBe("./mine.json");
  });

  it("recognizes -h", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("rejects a flag without its value", () => {
    expect(() => parseCliArgs(["--endpoint"])).toThrow("--endpoint needs a value");
    expect(() => parseCliArgs(["--delay", "--quiet"])).toThrow(ConfigError);
  });

  it("rejects unknown arguments", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
  });
});

describe("resolveProbeConfig", () => {
  it("applies defaults and strips the trailing slash from the endpoint", () => {
    const config = resolveProbeConfig(parseCliArgs([]), BASE_ENV);

    expect(config).toEqual({
      proxyEndpoint: "https://cdn.example.test",
      modelsFile: undefined,
      regions: undefined,
      delayMs: 300,
      maxTokens: 50,
      prompt: "Hello",
      verbose: true,
      logLevel: "info",
      logDir: undefined
    });
  });

  it("lets flags override the environment", () => {
    const config = resolveProbeConfig(
      parseCliArgs(["--endpoint", "https://flag.example.test", "--delay", "10", "--regions", "eu-west-1"]),
      { ...BASE_ENV, EDGEPROBE_DELAY_MS: "500", EDGEPROBE_REGIONS: "us-west-2" }
    );

    expect(config.proxyEndpoint).toBe("https://flag.example.test");
    expect(config.delayMs).toBe(10);
    expect(config.regions).toEqual(["eu-west-1"]);
  });

  it("reads the remaining settings from the environment", () => {
    const config = resolveProbeConfig(parseCliArgs(["--quiet"]), {
      ...BASE_ENV,
      EDGEPROBE_MODELS_FILE: "/tmp/models.json",
      EDGEPROBE_REGIONS: "us-west-2, us-east-1,",
      EDGEPROBE_MAX_TOKENS: "20",
      EDGEPROBE_PROMPT: "  Ping  ",
      LOG_LEVEL: "DEBUG",
      LOG_DIR: "/tmp/edgeprobe-logs"
    });

    expect(config.modelsFile).toBe("/tmp/models.json");
    expect(config.regions).toEqual(["us-west-2", "us-east-1"]);
    expect(config.maxTokens).toBe(20);
    expect(config.prompt).toBe("Ping");
    expect(config.verbose).toBe(false);
    expect(config.logLevel).toBe("debug");
    expect(config.logDir).toBe("/tmp/edgeprobe-logs");
  });

  it("requires a proxy endpoint", () => {
    expect(() => resolveProbeConfig(parseCliArgs([]), {})).toThrow(/No proxy endpoint/);
  });

  it("rejects endpoints that are not http(s) URLs", () => {
    expect(() => resolveProbeConfig(parseCliArgs([]), { EDGEPROBE_PROXY_ENDPOINT: "not a url" }))
      .toThrow("Proxy endpoint is not a URL: not a url");
    expect(() => resolveProbeConfig(parseCliArgs([]), { EDGEPROBE_PROXY_ENDPOINT: "ftp://cdn.example.test" }))
      .toThrow("Proxy endpoint must be http(s)");
  });

  it("rejects bad numbers", () => {
    expect(() => resolveProbeConfig(parseCliArgs(["--delay", "-5"]), BASE_ENV))
      .toThrow('Delay must be an integer >= 0 (got "-5")');
    expect(() => resolveProbeConfig(parseCliArgs([]), { ...BASE_ENV, EDGEPROBE_MAX_TOKENS: "0" }))
      .toThrow(ConfigError);
    expect(() => resolveProbeConfig(parseCliArgs([]), { ...BASE_ENV, EDGEPROBE_MAX_TOKENS: "2.5" }))
      .toThrow(ConfigError);
  });

  it("rejects malformed regions and log levels", () => {
    expect(() => resolveProbeConfig(parseCliArgs(["--regions", "mars"]), BASE_ENV))
      .toThrow("Not a region identifier: mars");
    expect(() => resolveProbeConfig(parseCliArgs([]), { ...BASE_ENV, LOG_LEVEL: "loud" }))
      .toThrow(ConfigError);
  });
});

describe("clearEndpointOverrides", () => {
  it("removes SDK endpoint variables and reports them", () => {
    const env: NodeJS.ProcessEnv = {
      AWS_ENDPOINT_URL_BEDROCK_RUNTIME: "https://leftover-proxy.example.test",
      AWS_ENDPOINT_URL: "https://global.example.test",
      AWS_REGION: "us-west-2"
    };

    expect(clearEndpointOverrides(env)).toEqual({
      AWS_ENDPOINT_URL_BEDROCK_RUNTIME: "https://leftover-proxy.example.test",
      AWS_ENDPOINT_URL: "https://global.example.test"
    });
    expect(env).toEqual({ AWS_REGION: "us-west-2" });
  });

  it("returns nothing when no override is set", () => {
    const env: NodeJS.ProcessEnv = { AWS_REGION: "us-west-2" };

    expect(clearEndpointOverrides(env)).toEqual({});
    expect(env).toEqual({ AWS_REGION: "us-west-2" });
  });
});
