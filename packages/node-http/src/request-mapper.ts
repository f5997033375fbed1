import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders, IncomingMessage } from "node:http";
import type { HttpMethod, HttpRequest, HttpResponse } from "@plinth/types";

const METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"];

const TRACE_HEADERS = ["traceparent", "tracestate"] as const;

export function toHttpMethod(raw: string | undefined): HttpMethod | null {
  const upper = raw?.toUpperCase();
  return METHODS.find((method) => method === upper) ?? null;
}

function parseHeaders(raw: IncomingHttpHeaders): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined) {
      headers[key.toLowerCase()] = value;
    }
  }
  return headers;
}

function parseQuery(params: URLSearchParams): Record<string, string | string[]> {
  const query: Record<string, string | string[]> = {};
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return query;
}

function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) return cookies;

  for (const cookie of header.split(";")) {
    const eqIndex = cookie.indexOf("=");
    if (eqIndex > 0) {
      cookies[cookie.slice(0, eqIndex).trim()] = cookie.slice(eqIndex + 1).trim();
    }
  }
  return cookies;
}

function isTextual(contentType: string | null): boolean {
  if (!contentType) return true;
  const type = contentType.toLowerCase();
  return type.startsWith("text/") || type.includes("json") || type.includes("xml") || type.includes("urlencoded");
}

function parseTraceContext(headers: Record<string, string | string[]>): Record<string, string> | null {
  const context: Record<string, string> = {};
  for (const name of TRACE_HEADERS) {
    const value = headers[name];
    if (typeof value === "string") context[name] = value;
  }
  return Object.keys(context).length > 0 ? context : null;
}

export type MapRequestOptions = {
  body: Buffer;
  /** Aborted when the client disconnects. */
  signal?: AbortSignal;
};

/**
 * Maps a Node request onto the framework's HttpRequest. The method must
 * already be known to be supported; see {@link toHttpMethod}.
 */
export function mapIncomingMessage(
  req: IncomingMessage,
  method: HttpMethod,
  options: MapRequestOptions,
): HttpRequest {
  const url = new URL(req.url ?? "/", "http://localhost");
  const headers = parseHeaders(req.headers);
  const contentType = req.headers["content-type"] ?? null;
  const hasBody = options.body.length > 0;
  const textual = isTextual(contentType);
  const requestId = req.headers["x-request-id"];

  return {
    method,
    path: url.pathname,
    pathParams: {},
    query: parseQuery(url.searchParams),
    headers,
    cookies: parseCookies(req.headers.cookie),
    textBody: hasBody && textual ? options.body.toString("utf8") : null,
    binaryBody: hasBody && !textual ? options.body : null,
    contentType,
    requestId: typeof requestId === "string" && requestId ? requestId : randomUUID(),
    requestTime: new Date().toISOString(),
    auth: null,
    clientIp: req.socket.remoteAddress ?? null,
    traceContext: parseTraceContext(headers),
    userAgent: req.headers["user-agent"] ?? null,
    matchedRoute: null,
    signal: options.signal,
  };
}

/** Subset of `ServerResponse` the transport writes through. */
export interface ResponseWriter {
  readonly writableEnded: boolean;
  writeHead(statusCode: number, headers: Record<string, string | number>): unknown;
  end(body?: string | Buffer): unknown;
  on(event: "close", listener: () => void): unknown;
}

export function writeResponse(res: ResponseWriter, response: HttpResponse, method: HttpMethod): void {
  const payload = response.binaryBody ?? (response.body !== undefined ? Buffer.from(response.body, "utf8") : null);
  const headers: Record<string, string | number> = { ...(response.headers ?? {}) };
  if (payload) headers["content-length"] = payload.length;

  res.writeHead(response.status, headers);
  res.end(payload && method !== "HEAD" ? payload : undefined);
}
