/**
 * Authenticated HTTP transport for the Graph API.
 *
 * Every request carries the current bearer token. A 401/403 triggers one
 * forced token refresh and one retry; the caller only ever sees the final,
 * post-retry response. Other non-2xx statuses are returned, not thrown:
 * callers give some of them their own meaning (202 on copy submit, 503 on
 * operation status).
 */

import axios from "axios";
import type { TokenManager } from "../auth/tokens.js";
import { AuthError, RemoteError } from "../errors.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface TransportResponse {
  status: number;
  /** Response headers with lower-cased names. */
  headers: Record<string, string>;
  body: Buffer;
}

export interface Transport {
  request(
    method: HttpMethod,
    url: string,
    body?: Buffer | string,
    headers?: Record<string, string>,
  ): Promise<TransportResponse>;
}

export interface GraphTransportOptions {
  tokens: TokenManager;
  timeoutMs?: number;
}

function isAuthFailure(status: number): boolean {
  return status === 401 || status === 403;
}

function normalizeHeaders(raw: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!raw || typeof raw !== "object") return headers;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      headers[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      headers[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(", ");
    }
  }
  return headers;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === "string") return Buffer.from(data, "utf-8");
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), "utf-8");
}

export function createGraphTransport(options: GraphTransportOptions): Transport {
  const timeout = options.timeoutMs ?? 30_000;

  async function send(
    method: HttpMethod,
    url: string,
    token: string,
    body: Buffer | string | undefined,
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    const response = await axios.request({
      method,
      url,
      data: body,
      headers: { ...headers, Authorization: `Bearer ${token}` },
      responseType: "arraybuffer",
      timeout,
      // Graph status codes are interpreted by the callers.
      validateStatus: () => true,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: toBuffer(response.data),
    };
  }

  return {
    async request(method, url, body, headers = {}) {
      const token = await options.tokens.getAccessToken();
      const first = await send(method, url, token, body, headers);
      if (!isAuthFailure(first.status)) {
        return first;
      }

      console.log(`[graph] ${method} ${url} returned ${first.status}, refreshing token and retrying`);
      const refreshed = await options.tokens.refresh();
      const retry = await send(method, url, refreshed, body, headers);
      if (isAuthFailure(retry.status)) {
        throw new AuthError(
          `authentication failed even after token refresh: HTTP ${retry.status} - ${retry.body.toString("utf-8")}`,
        );
      }
      return retry;
    },
  };
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Throw a RemoteError carrying status and body unless the response is 2xx.
 */
export function ensureSuccess(response: TransportResponse, operation: string): void {
  if (!isSuccess(response.status)) {
    throw new RemoteError(operation, response.status, response.body.toString("utf-8"));
  }
}

/**
 * Parse a JSON object body. Invalid JSON, arrays and scalars are a RemoteError.
 */
export function parseJsonBody(response: TransportResponse, operation: string): Record<string, unknown> {
  const text = response.body.toString("utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new RemoteError(operation, 0, text, `response is not valid JSON: ${String(error)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new RemoteError(operation, 0, text, "response is not a JSON object");
  }
  return parsed;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
