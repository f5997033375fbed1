import type { DependencyResolver } from "./container";
import type { PlinthLogger } from "./telemetry";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type HttpRequest = {
  method: HttpMethod;
  path: string;
  pathParams: Record<string, string>;
  query: Record<string, string | string[]>;
  headers: Record<string, string | string[]>;
  cookies: Record<string, string>;
  textBody: string | null;
  binaryBody: Buffer | null;
  contentType: string | null;
  requestId: string;
  requestTime: string;
  /** Results of the security schemes that accepted the request, keyed by scheme name. */
  auth: Record<string, unknown> | null;
  clientIp: string | null;
  traceContext: Record<string, string> | null;
  userAgent: string | null;
  matchedRoute: string | null;
  /** Aborted when the client disconnects. */
  signal?: AbortSignal;
};

export type HttpResponse = {
  status: number;
  headers?: Record<string, string>;
  body?: string;
  binaryBody?: Buffer;
};

export interface HandlerMetadata {
  /** Read metadata by key. Request-scoped values shadow route values. */
  get<T = unknown>(key: string): T | undefined;
  /** Write a request-scoped value. Does not mutate route metadata. */
  set(key: string, value: unknown): void;
  /** Check if key exists (either scope). */
  has(key: string): boolean;
}

export type HandlerContext = {
  request: HttpRequest;
  metadata: HandlerMetadata;
  /** Per-request dependency scope for the matched route. */
  dependencies: DependencyResolver;
  /** Request-scoped logger set by TelemetryLayer. Enriched with requestId, method, path. */
  logger?: PlinthLogger;
};
