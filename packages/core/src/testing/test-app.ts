import type { HttpMethod, HttpRequest, HttpResponse } from "@plinth/types";
import type { PlinthApplication } from "../application/application";
import type { WebSocketConnection } from "../websocket/connect";
import type { WebSocketChannel } from "../websocket/session";

export type MockRequestOptions = {
  pathParams?: Record<string, string>;
  /** Merged over any query string in the path. */
  query?: Record<string, string | string[]>;
  /** Names are lower-cased, as a transport would. */
  headers?: Record<string, string | string[]>;
  cookies?: Record<string, string>;
  /** Serialised as JSON unless it is already a string. */
  body?: unknown;
  contentType?: string;
  auth?: Record<string, unknown>;
  requestId?: string;
  clientIp?: string;
  signal?: AbortSignal;
};

/** Drives a started application in-process, without a transport. */
export class TestingApplication {
  constructor(private readonly app: PlinthApplication) {}

  async inject(request: HttpRequest): Promise<HttpResponse> {
    return this.app.dispatch(request);
  }

  /** Shorthand for `inject(mockRequest(method, path, options))`. */
  async request(method: HttpMethod, path: string, options?: MockRequestOptions): Promise<HttpResponse> {
    return this.app.dispatch(mockRequest(method, path, options));
  }

  async connect(request: HttpRequest, channel: WebSocketChannel): Promise<WebSocketConnection> {
    return this.app.connect(request, channel);
  }

  async close(): Promise<void> {
    await this.app.shutdown();
  }

  getApplication(): PlinthApplication {
    return this.app;
  }
}

function splitTarget(target: string): { path: string; query: Record<string, string | string[]> } {
  const marker = target.indexOf("?");
  if (marker < 0) return { path: target, query: {} };

  const query: Record<string, string | string[]> = {};
  const params = new URLSearchParams(target.slice(marker + 1));
  for (const name of new Set(params.keys())) {
    const values = params.getAll(name);
    query[name] = values.length === 1 ? values[0] : values;
  }
  return { path: target.slice(0, marker), query };
}

function lowerCaseKeys<V>(record: Record<string, V>): Record<string, V> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));
}

function encodeBody(body: unknown): string | null {
  if (body === undefined) return null;
  return typeof body === "string" ? body : JSON.stringify(body);
}

/**
 * Builds the request a transport would hand to `dispatch`. A query string in
 * `path` is parsed into `query`.
 */
export function mockRequest(
  method: HttpMethod,
  path: string,
  options: MockRequestOptions = {},
): HttpRequest {
  const target = splitTarget(path);
  const textBody = encodeBody(options.body);
  return {
    method,
    path: target.path,
    pathParams: options.pathParams ?? {},
    query: { ...target.query, ...options.query },
    headers: lowerCaseKeys(options.headers ?? {}),
    cookies: options.cookies ?? {},
    textBody,
    binaryBody: null,
    contentType: options.contentType ?? (textBody === null ? null : "application/json"),
    requestId: options.requestId ?? "test-request-id",
    requestTime: new Date().toISOString(),
    auth: options.auth ?? null,
    clientIp: options.clientIp ?? "127.0.0.1",
    traceContext: null,
    userAgent: "plinth-testing",
    matchedRoute: null,
    signal: options.signal,
  };
}
