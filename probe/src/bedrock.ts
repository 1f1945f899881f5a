/**
 * Bedrock Runtime Client
 *
 * A thin seam over `InvokeModel`. The checker only sees `InferenceClient`,
 * so tests swap in a fake factory and never reach the network.
 *
 * The endpoint is passed per client. When it is omitted the SDK resolves
 * the default regional endpoint; when it is set (proxy mode) every request
 * goes to that URL instead, still signed for the given region.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { ResponseFormatError } from "./errors.js";
import type { TokenUsage } from "./types.js";

// ============================================
// CLIENT SEAM
// ============================================

export interface InferenceClientOptions {
  region: string;
  /** Endpoint override; undefined means the default regional endpoint */
  endpoint?: string;
}

export interface InvokeRequest {
  modelId: string;
  /** Serialized JSON request body */
  body: string;
}

export interface InvokeResponse {
  statusCode: number;
  body: Uint8Array;
}

export interface InferenceClient {
  invoke(request: InvokeRequest): Promise<InvokeResponse>;
  destroy?(): void;
}

export type InferenceClientFactory = (options: InferenceClientOptions) => InferenceClient;

// ============================================
// REQUEST / RESPONSE BODIES
// ============================================

export const ANTHROPIC_BEDROCK_VERSION = "bedrock-2023-05-31";

export interface MessagesRequestBody {
  anthropic_version: string;
  max_tokens: number;
  messages: { role: "user"; content: string }[];
}

export function buildRequestBody(options: { maxTokens: number; prompt: string }): MessagesRequestBody {
  return {
    anthropic_version: ANTHROPIC_BEDROCK_VERSION,
    max_tokens: options.maxTokens,
    messages: [{ role: "user", content: options.prompt }]
  };
}

export interface ParsedCompletion {
  text: string;
  usage: TokenUsage;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull `content[0].text` and `usage.{input,output}_tokens` out of a Messages
 * API response body.
 */
export function parseInvokeResponse(body: Uint8Array): ParsedCompletion {
  const text = new TextDecoder().decode(body);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new ResponseFormatError(`Response body is not JSON: ${text.slice(0, 120)}`);
  }

  if (!isRecord(data)) {
    throw new ResponseFormatError("Response body is not a JSON object");
  }

  const content = data.content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (!isRecord(first) || typeof first.text !== "string") {
    throw new ResponseFormatError("Response has no content[0].text");
  }

  const usage = data.usage;
  if (!isRecord(usage) || typeof usage.input_tokens !== "number" || typeof usage.output_tokens !== "number") {
    throw new ResponseFormatError("Response has no usage token counts");
  }

  return {
    text: first.text,
    usage: { input: usage.input_tokens, output: usage.output_tokens }
  };
}

// ============================================
// SDK IMPLEMENTATION
// ============================================

export class BedrockInferenceClient implements InferenceClient {
  private client: BedrockRuntimeClient;

  constructor(options: InferenceClientOptions) {
    this.client = new BedrockRuntimeClient({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint } : {})
    });
  }

  async invoke(request: InvokeRequest): Promise<InvokeResponse> {
    const output = await this.client.send(new InvokeModelCommand({
      modelId: request.modelId,
      body: request.body,
      contentType: "application/json",
      accept: "application/json"
    }));

    if (!output.body) {
      throw new ResponseFormatError("Response has an empty body");
    }

    return {
      statusCode: output.$metadata.httpStatusCode ?? 200,
      body: output.body
    };
  }

  destroy(): void {
    this.client.destroy();
  }
}

export const createBedrockClient: InferenceClientFactory = options => new BedrockInferenceClient(options);
