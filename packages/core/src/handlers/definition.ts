import type {
  HttpMethod,
  HttpResponse,
  PlinthLayer,
  ResolvedDescriptors,
  TypeDescriptor,
} from "@plinth/types";
import type { Infer, ObjectShape, Shape } from "../schema/shapes";
import type { HandlerRequest, RouteContext } from "./context";
import type { WebSocketSession } from "../websocket/session";

export type RouteKind = "http" | "websocket";

// Handlers are stored with their argument types erased. Method-style
// declarations are checked bivariantly, so typed handlers assign to it.
type ErasedHandler = {
  bivarianceHack(...args: unknown[]): unknown;
}["bivarianceHack"];

/** Plain value describing one route, produced by `createRoute` and its shorthands. */
export type RouteDescriptor = {
  kind: RouteKind;
  method: HttpMethod;
  path: string;
  params?: ObjectShape;
  query?: ObjectShape;
  headers?: ObjectShape;
  body?: Shape;
  response?: Shape;
  status: number;
  dependencies: readonly TypeDescriptor[];
  tags: readonly string[];
  /** `undefined` inherits the router's requirement; `[]` opts out of security. */
  security?: readonly string[];
  summary?: string;
  description?: string;
  operationId?: string;
  deprecated?: boolean;
  layers: readonly PlinthLayer[];
  includeInDocs: boolean;
  metadata: Readonly<Record<string, unknown>>;
  handler: ErasedHandler;
};

export type RouteOptions<
  P extends ObjectShape | undefined = undefined,
  Q extends ObjectShape | undefined = undefined,
  H extends ObjectShape | undefined = undefined,
  B extends Shape | undefined = undefined,
  R extends Shape | undefined = undefined,
  D extends readonly TypeDescriptor[] = [],
> = {
  params?: P;
  query?: Q;
  headers?: H;
  body?: B;
  response?: R;
  /** Success status. Defaults to 201 for POST and 200 otherwise. */
  status?: number;
  inject?: [...D];
  tags?: string[];
  security?: string[];
  summary?: string;
  description?: string;
  operationId?: string;
  deprecated?: boolean;
  layers?: PlinthLayer[];
  includeInDocs?: boolean;
  metadata?: Record<string, unknown>;
};

type MaybePromise<T> = T | Promise<T>;

export type HandlerResult<R> = MaybePromise<
  (R extends Shape ? Infer<R> : unknown) | HttpResponse | undefined | void
>;

export type RouteHandler<
  P = undefined,
  Q = undefined,
  H = undefined,
  B = undefined,
  R = undefined,
  D extends readonly TypeDescriptor[] = [],
> = (
  req: HandlerRequest<P, Q, H, B>,
  ctx: RouteContext,
  ...deps: ResolvedDescriptors<D>
) => HandlerResult<R>;

export type WebSocketHandler<
  P = undefined,
  Q = undefined,
  H = undefined,
  D extends readonly TypeDescriptor[] = [],
> = (
  session: WebSocketSession,
  req: HandlerRequest<P, Q, H>,
  ctx: RouteContext,
  ...deps: ResolvedDescriptors<D>
) => MaybePromise<void>;

export type RouteConfig<
  P extends ObjectShape | undefined = undefined,
  Q extends ObjectShape | undefined = undefined,
  H extends ObjectShape | undefined = undefined,
  B extends Shape | undefined = undefined,
  R extends Shape | undefined = undefined,
  D extends readonly TypeDescriptor[] = [],
> = RouteOptions<P, Q, H, B, R, D> & {
  method: HttpMethod;
  path: string;
};

type AnyRouteOptions = Omit<
  RouteOptions,
  "params" | "query" | "headers" | "body" | "response" | "inject"
> & {
  params?: ObjectShape;
  query?: ObjectShape;
  headers?: ObjectShape;
  body?: Shape;
  response?: Shape;
  inject?: readonly TypeDescriptor[];
};

type AnyRouteConfig = AnyRouteOptions & { method: HttpMethod; path: string };

function defaultStatus(method: HttpMethod): number {
  return method === "POST" ? 201 : 200;
}

function describeRoute(
  kind: RouteKind,
  config: AnyRouteConfig,
  handler: ErasedHandler,
): RouteDescriptor {
  return {
    kind,
    method: config.method,
    path: config.path,
    params: config.params,
    query: config.query,
    headers: config.headers,
    body: config.body,
    response: config.response,
    status: config.status ?? (kind === "websocket" ? 101 : defaultStatus(config.method)),
    dependencies: [...(config.inject ?? [])],
    tags: [...(config.tags ?? [])],
    security: config.security ? [...config.security] : undefined,
    summary: config.summary,
    description: config.description,
    operationId: config.operationId,
    deprecated: config.deprecated,
    layers: [...(config.layers ?? [])],
    includeInDocs: config.includeInDocs ?? true,
    metadata: { ...(config.metadata ?? {}) },
    handler,
  };
}

export function createRoute<
  P extends ObjectShape | undefined = undefined,
  Q extends ObjectShape | undefined = undefined,
  H extends ObjectShape | undefined = undefined,
  B extends Shape | undefined = undefined,
  R extends Shape | undefined = undefined,
  D extends readonly TypeDescriptor[] = [],
>(
  config: RouteConfig<P, Q, H, B, R, D>,
  handler: RouteHandler<P, Q, H, B, R, D>,
): RouteDescriptor {
  return describeRoute("http", config, handler);
}

// -- Shorthand helpers --------------------------------------------------------

type Shorthand = {
  (path: string, handler: RouteHandler): RouteDescriptor;
  <
    P extends ObjectShape | undefined = undefined,
    Q extends ObjectShape | undefined = undefined,
    H extends ObjectShape | undefined = undefined,
    B extends Shape | undefined = undefined,
    R extends Shape | undefined = undefined,
    D extends readonly TypeDescriptor[] = [],
  >(
    path: string,
    options: RouteOptions<P, Q, H, B, R, D>,
    handler: RouteHandler<P, Q, H, B, R, D>,
  ): RouteDescriptor;
};

function shorthand(method: HttpMethod): Shorthand {
  return (
    path: string,
    handlerOrOptions: ErasedHandler | AnyRouteOptions,
    maybeHandler?: ErasedHandler,
  ): RouteDescriptor => {
    if (typeof handlerOrOptions === "function") {
      return describeRoute("http", { path, method }, handlerOrOptions);
    }
    if (!maybeHandler) {
      throw new TypeError(`${method} ${path}: a handler function is required`);
    }
    return describeRoute("http", { path, method, ...handlerOrOptions }, maybeHandler);
  };
}

export const httpGet: Shorthand = shorthand("GET");
export const httpPost: Shorthand = shorthand("POST");
export const httpPut: Shorthand = shorthand("PUT");
export const httpPatch: Shorthand = shorthand("PATCH");
export const httpDelete: Shorthand = shorthand("DELETE");

export type WebSocketOptions<
  P extends ObjectShape | undefined = undefined,
  Q extends ObjectShape | undefined = undefined,
  H extends ObjectShape | undefined = undefined,
  D extends readonly TypeDescriptor[] = [],
> = Omit<RouteOptions<P, Q, H, undefined, undefined, D>, "body" | "response" | "status">;

/**
 * Declares a WebSocket route. It is matched as `GET` and documented with a
 * `101 Switching Protocols` response.
 */
export function websocket<
  P extends ObjectShape | undefined = undefined,
  Q extends ObjectShape | undefined = undefined,
  H extends ObjectShape | undefined = undefined,
  D extends readonly TypeDescriptor[] = [],
>(
  path: string,
  options: WebSocketOptions<P, Q, H, D>,
  handler: WebSocketHandler<P, Q, H, D>,
): RouteDescriptor {
  return describeRoute("websocket", { path, method: "GET", ...options }, handler);
}
