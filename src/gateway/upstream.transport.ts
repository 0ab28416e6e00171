import type { Readable } from "stream";
import axios from "axios";
import type { ProxySettings } from "@/common/types/gateway";

export const UPSTREAM_TRANSPORT = "UPSTREAM_TRANSPORT";

export type HeaderMap = Record<string, string | string[]>;

export interface UpstreamRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
  proxy?: ProxySettings;
  timeoutMs: number;
}

export interface UpstreamResponse {
  status: number;
  headers: HeaderMap;
  body: Readable;
}

/**
 * One HTTP round trip to an upstream site. Never throws for an HTTP status;
 * rejects only when no response arrives (connection refused, reset, timeout).
 */
export interface UpstreamTransport {
  send(request: UpstreamRequest): Promise<UpstreamResponse>;
}

// Recomputed by the server that relays the body
const STRIPPED_RESPONSE_HEADERS = new Set(["content-length", "transfer-encoding", "content-encoding", "connection"]);

export class AxiosUpstreamTransport implements UpstreamTransport {
  async send(request: UpstreamRequest): Promise<UpstreamResponse> {
    const response = await axios.request<Readable>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.body && request.body.length > 0 ? request.body : undefined,
      timeout: request.timeoutMs,
      proxy: request.proxy ? { protocol: request.proxy.protocol, host: request.proxy.host, port: request.proxy.port } : false,
      responseType: "stream",
      maxRedirects: 0,
      validateStatus: () => true,
    });

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: response.data,
    };
  }
}

export function normalizeHeaders(headers: object): HeaderMap {
  const normalized: HeaderMap = {};
  const entries: [string, unknown][] = Object.entries(headers);
  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    if (STRIPPED_RESPONSE_HEADERS.has(key)) continue;

    if (Array.isArray(value)) {
      normalized[key] = value.map(String);
    } else if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      normalized[key] = String(value);
    }
  }
  return normalized;
}

export function headerValue(headers: HeaderMap, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(", ") : value;
}
