// provider/client.ts - Lambda Cloud API request helper
//
// Thin transport: fetch() with basic auth and JSON bodies. Every response is
// handed to the classifier in errors.ts; nothing here retries.

import type { Static, TSchema } from "@sinclair/typebox";
import {
  classifyResponse,
  classifyTransportFailure,
  isSuccessStatus,
  mapLambdaError,
} from "./errors";

// =============================================================================
// Constants
// =============================================================================

export const LAMBDA_API_BASE = "https://cloud.lambdalabs.com/api/v1/";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface LambdaClientConfig {
  apiKey: string;
  apiBase?: string;
  /** For tests only: inject a custom fetch implementation. */
  fetchImpl?: typeof fetch;
}

export interface RequestOptions {
  body?: unknown;
  signal?: AbortSignal;
}

interface Exchange {
  status: number;
  text: string;
}

/**
 * The API key is the basic-auth username; the password is empty.
 */
export function basicAuthHeader(apiKey: string): string {
  return `Basic ${Buffer.from(`${apiKey}:`, "utf-8").toString("base64")}`;
}

/** Join base and relative path the way the service expects: one slash */
export function buildUrl(apiBase: string, path: string): string {
  const base = apiBase.endsWith("/") ? apiBase : `${apiBase}/`;
  return base + path.replace(/^\/+/, "");
}

// =============================================================================
// Client
// =============================================================================

export class LambdaClient {
  readonly provider = "lambda" as const;

  private readonly authorization: string;
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: LambdaClientConfig) {
    this.authorization = basicAuthHeader(config.apiKey);
    this.apiBase = config.apiBase ?? LAMBDA_API_BASE;
    this.fetchImpl = config.fetchImpl ?? globalThis.fetch;
  }

  /** Send a request and decode the 2xx body against `schema` */
  async request<T extends TSchema>(
    method: HttpMethod,
    path: string,
    schema: T,
    options: RequestOptions = {},
  ): Promise<Static<T>> {
    const { status, text } = await this.exchange(method, path, options);
    return classifyResponse(this.provider, status, text, schema);
  }

  /** Send a request whose 2xx body carries nothing the caller needs */
  async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<void> {
    const { status, text } = await this.exchange(method, path, options);
    if (!isSuccessStatus(status)) {
      throw mapLambdaError(this.provider, status, text);
    }
  }

  private async exchange(
    method: HttpMethod,
    path: string,
    { body, signal }: RequestOptions,
  ): Promise<Exchange> {
    const headers: Record<string, string> = {
      "Authorization": this.authorization,
      "Accept": "application/json",
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    try {
      const response = await this.fetchImpl(buildUrl(this.apiBase, path), {
        method,
        headers,
        signal,
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      });
      return { status: response.status, text: await response.text() };
    } catch (err) {
      throw classifyTransportFailure(this.provider, err, signal);
    }
  }
}
