/**
 * In-process Transport for tests: answers from a handler and records every
 * request it receives.
 */

import type { HttpMethod, Transport, TransportResponse } from "./transport.js";

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  body: string;
  headers: Record<string, string>;
}

export type RequestHandler = (request: RecordedRequest) => TransportResponse | Promise<TransportResponse>;

export interface RecordingTransport extends Transport {
  readonly requests: RecordedRequest[];
}

export function createRecordingTransport(handler: RequestHandler): RecordingTransport {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    async request(method, url, body, headers = {}) {
      const recorded: RecordedRequest = {
        method,
        url,
        body: body === undefined ? "" : Buffer.isBuffer(body) ? body.toString("latin1") : body,
        headers,
      };
      requests.push(recorded);
      return handler(recorded);
    },
  };
}

export function textResponse(status: number, text: string, headers: Record<string, string> = {}): TransportResponse {
  return { status, headers, body: Buffer.from(text, "utf-8") };
}

export function jsonResponse(status: number, value: unknown): TransportResponse {
  return textResponse(status, JSON.stringify(value), { "content-type": "application/json" });
}
