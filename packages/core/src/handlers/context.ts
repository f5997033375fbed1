import type {
  DependencyResolver,
  HandlerMetadata,
  HttpMethod,
  HttpRequest,
  PlinthLogger,
} from "@plinth/types";
import type { Infer, ObjectShape, Shape } from "../schema/shapes";
import { decodeBody } from "./body";

type Validated<S, Fallback> = S extends Shape ? Infer<S> : Fallback;

/** The request as a handler sees it: validated, coerced and typed. */
export type HandlerRequest<P = undefined, Q = undefined, H = undefined, B = undefined> = {
  method: HttpMethod;
  path: string;
  params: Validated<P, Record<string, string>>;
  query: Validated<Q, Record<string, string | string[]>>;
  headers: Validated<H, Record<string, string | string[]>>;
  body: Validated<B, unknown>;
  cookies: Record<string, string>;
  auth: Record<string, unknown> | null;
  clientIp: string | null;
  userAgent: string | null;
  contentType: string | null;
};

export type RouteContext = {
  requestId: string;
  requestTime: string;
  metadata: HandlerMetadata;
  dependencies: DependencyResolver;
  /** Request-scoped logger set by TelemetryLayer. */
  logger?: PlinthLogger;
  /** Aborted when the client disconnects or the request times out. */
  signal: AbortSignal;
  raw: HttpRequest;
};

export const VALIDATED_PARAMS = "validatedParams";
export const VALIDATED_QUERY = "validatedQuery";
export const VALIDATED_HEADERS = "validatedHeaders";
export const VALIDATED_BODY = "validatedBody";

export type ValidatedShapes = {
  params?: ObjectShape;
  query?: ObjectShape;
  headers?: ObjectShape;
  body?: Shape;
};

export function buildHandlerRequest(request: HttpRequest, metadata: HandlerMetadata): HandlerRequest {
  const body = metadata.has(VALIDATED_BODY)
    ? metadata.get<unknown>(VALIDATED_BODY)
    : decodeBody(request);

  return {
    method: request.method,
    path: request.path,
    params: metadata.get<Record<string, string>>(VALIDATED_PARAMS) ?? request.pathParams,
    query: metadata.get<Record<string, string | string[]>>(VALIDATED_QUERY) ?? request.query,
    headers: metadata.get<Record<string, string | string[]>>(VALIDATED_HEADERS) ?? request.headers,
    body,
    cookies: request.cookies,
    auth: request.auth,
    clientIp: request.clientIp,
    userAgent: request.userAgent,
    contentType: request.contentType,
  };
}

export function buildRouteContext(
  request: HttpRequest,
  metadata: HandlerMetadata,
  dependencies: DependencyResolver,
  signal: AbortSignal,
  logger?: PlinthLogger,
): RouteContext {
  return {
    requestId: request.requestId,
    requestTime: request.requestTime,
    metadata,
    dependencies,
    logger,
    signal,
    raw: request,
  };
}
