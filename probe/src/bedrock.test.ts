/**
 * Bedrock Client Tests
 *
 * The SDK module is replaced with an in-process fake, so these cover how
 * the client is configured and how responses are unpacked, not the SDK.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { sdk } = vi.hoisted(() => ({
  sdk: {
    configs: [] as unknown[],
    commands: [] as unknown[],
    send: vi.fn(),
    destroy: vi.fn()
  }
}));

vi.mock("@aws-sdk/client-bedrock-runtime", () => ({
  BedrockRuntimeClient: class {
    constructor(config: unknown) {
      sdk.configs.push(config);
    }
    send(command: unknown) {
      return sdk.send(command);
    }
    destroy() {
      sdk.destroy();
    }
  },
  InvokeModelCommand: class {
    input: unknown;
    constructor(input: unknown) {
      this.input = input;
      sdk.commands.push(input);
    }
  }
}));

import {
  ANTHROPIC_BEDROCK_VERSION,
  BedrockInferenceClient,
  buildRequestBody,
  createBedrockClient,
  parseInvokeResponse
} from "./bedrock.js";
import { ResponseFormatError } from "./errors.js";

const encode = (value: unknown): Uint8Array => new TextEncoder().encode(JSON.stringify(value));

beforeEach(() => {
  sdk.configs.length = 0;
  sdk.commands.length = 0;
  sdk.send.mockReset();
  sdk.destroy.mockReset();
});

// ============================================
// REQUEST BODY
// ============================================

describe("buildRequestBody", () => {
  it("builds a single-message Messages API request", () => {
    expect(buildRequestBody({ maxTokens: 50, prompt: "Hello" })).toEqual({
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: 50,
      messages: [{ role: "user", content: "Hello" }]
    });
    expect(ANTHROPIC_BEDROCK_VERSION).toBe("bedrock-2023-05-31");
  });
});

// ============================================
// RESPONSE PARSING
// ============================================

describe("parseInvokeResponse", () => {
  it("extracts the first text block and token usage", () => {
    const parsed = parseInvokeResponse(encode({
      content: [{ type: "text", text: "Hi there" }, { type: "text", text: "ignored" }],
      usage: { input_tokens: 8, output_tokens: 5 }
    }));

    expect(parsed).toEqual({ text: "Hi there", usage: { input: 8, output: 5 } });
  });

  it("rejects a non-JSON body", () => {
    expect(() => parseInvokeResponse(new TextEncoder().encode("<html>502</html>")))
      .toThrow("Response body is not JSON: <html>502</html>");
  });

  it("rejects a body without content", () => {
    expect(() => parseInvokeResponse(encode({ content: [], usage: { input_tokens: 1, output_tokens: 1 } })))
      .toThrow(ResponseFormatError);
  });

  it("rejects a body without usage counts", () => {
    expect(() => parseInvokeResponse(encode({ content: [{ text: "ok" }], usage: { input_tokens: 1 } })))
      .toThrow("Response has no usage token counts");
  });

  it("rejects a JSON array", () => {
    expect(() => parseInvokeResponse(encode([1, 2]))).toThrow("Response body is not a JSON object");
  });
});

// ============================================
// SDK CLIENT
// ============================================

describe("BedrockInferenceClient", () => {
  it("uses the default endpoint when none is given", () => {
    new BedrockInferenceClient({ region: "us-west-2" });
    expect(sdk.configs).toEqual([{ region: "us-west-2" }]);
  });

  it("passes an endpoint override through", () => {
    createBedrockClient({ region: "eu-west-1", endpoint: "https://cdn.example.test" });
    expect(sdk.configs).toEqual([{ region: "eu-west-1", endpoint: "https://cdn.example.test" }]);
  });

  it("sends InvokeModel with JSON content types and returns status and body", async () => {
    const body = encode({ content: [{ text: "ok" }], usage: { input_tokens: 1, output_tokens: 2 } });
    sdk.send.mockResolvedValue({ body, $metadata: { httpStatusCode: 200 } });

    const client = new BedrockInferenceClient({ region: "us-east-1" });
    const response = await client.invoke({ modelId: "model-a", body: "{}" });

    expect(sdk.commands).toEqual([{
      modelId: "model-a",
      body: "{}",
      contentType: "application/json",
      accept: "application/json"
    }]);
    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(body);
  });

  it("defaults the status code to 200 when metadata omits it", async () => {
    sdk.send.mockResolvedValue({ body: encode({}), $metadata: {} });

    const response = await new BedrockInferenceClient({ region: "us-east-1" }).invoke({ modelId: "m", body: "{}" });

    expect(response.statusCode).toBe(200);
  });

  it("treats a missing body as a format error", async () => {
    sdk.send.mockResolvedValue({ $metadata: { httpStatusCode: 200 } });

    await expect(new BedrockInferenceClient({ region: "us-east-1" }).invoke({ modelId: "m", body: "{}" }))
      .rejects.toBeInstanceOf(ResponseFormatError);
  });

  it("propagates SDK errors unchanged", async () => {
    const denied = Object.assign(new Error("not authorized"), { name: "AccessDeniedException" });
    sdk.send.mockRejectedValue(denied);

    await expect(new BedrockInferenceClient({ region: "us-east-1" }).invoke({ modelId: "m", body: "{}" }))
      .rejects.toBe(denied);
  });

  it("destroy releases the SDK client", () => {
    new BedrockInferenceClient({ region: "us-east-1" }).destroy();
    expect(sdk.destroy).toHaveBeenCalledTimes(1);
  });
});
