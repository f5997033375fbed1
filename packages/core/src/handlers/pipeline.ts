import createDebug from "debug";
import type {
  HandlerContext,
  HttpRequest,
  HttpResponse,
  PlinthLayer,
  PlinthLogger,
} from "@plinth/types";
import { runLayerPipeline } from "../layers/pipeline";
import { HttpException, MethodNotAllowedException } from "../errors/http-exception";
import { MissingBindingError, RequestCancelledError, UnknownTypeError } from "../errors/runtime-errors";
import { HandlerMetadataStore } from "../metadata/handler-metadata";
import type { DependencyGraph } from "../di/dependency-graph";
import type { RequestScope } from "../di/request-scope";
import type { ComposedRoute } from "../routing/route-table";
import { abortable, throwIfCancelled } from "./abort";
import { buildHandlerRequest, buildRouteContext } from "./context";

const debug = createDebug("plinth:core:pipeline");

/** A composed route with its complete layer chain, ready to serve. */
export type PreparedRoute = {
  route: ComposedRoute;
  /** System, security, application, router, route and validation layers, in run order. */
  layers: readonly PlinthLayer[];
};

export type PipelineOptions = {
  graph: DependencyGraph;
  /** Used when no request logger has been set by a layer. */
  logger?: PlinthLogger;
  signal: AbortSignal;
};

type Invocation = {
  context: HandlerContext;
  scope: RequestScope;
  args: unknown[];
};

/**
 * Runs the layer chain around `invoke`, resolving the route's dependencies in
 * a fresh request scope first. The scope is released when the returned
 * promise settles unless `invoke` takes ownership by returning `keepScope`.
 */
export async function runRoute(
  prepared: PreparedRoute,
  request: HttpRequest,
  options: PipelineOptions,
  invoke: (invocation: Invocation) => Promise<{ response: HttpResponse; keepScope?: boolean }>,
): Promise<HttpResponse> {
  const { route } = prepared;
  request.matchedRoute = route.path;

  const scope = options.graph.createRequestScope(route.scope, options.signal, options.logger);
  const context: HandlerContext = {
    request,
    metadata: new HandlerMetadataStore(route.metadata),
    dependencies: scope,
  };

  let keepScope = false;
  try {
    return await runLayerPipeline(
      prepared.layers,
      context,
      async () => {
        const args = await scope.resolveAll(route.dependencies);
        throwIfCancelled(options.signal);
        const outcome = await invoke({ context, scope, args });
        keepScope = outcome.keepScope ?? false;
        return outcome.response;
      },
      options.signal,
    );
  } catch (error) {
    return toErrorResponse(error, context.logger ?? options.logger);
  } finally {
    if (!keepScope) await scope.release();
  }
}

export async function executeHandlerPipeline(
  prepared: PreparedRoute,
  request: HttpRequest,
  options: PipelineOptions,
): Promise<HttpResponse> {
  const { route } = prepared;
  debug("execute %s %s", route.method, route.path);

  return runRoute(prepared, request, options, async ({ context, scope, args }) => {
    const req = buildHandlerRequest(context.request, context.metadata);
    const ctx = buildRouteContext(context.request, context.metadata, scope, options.signal, context.logger);
    const result = await abortable(Promise.resolve(route.handler(req, ctx, ...args)), options.signal);
    throwIfCancelled(options.signal);
    return { response: normalizeResponse(result, route.status) };
  });
}

/**
 * Maps a pipeline failure to a response. Cancellation is rethrown: the
 * transport writes nothing for a cancelled request.
 */
export function toErrorResponse(error: unknown, logger?: PlinthLogger): HttpResponse {
  if (error instanceof RequestCancelledError) throw error;

  if (error instanceof UnknownTypeError || error instanceof MissingBindingError) {
    // Both mean the application was built inconsistently.
    debug("internal lookup failure: %O", error);
    logger?.error("Internal lookup failed while serving a request", { error: error.message });
    return jsonResponse(500, { message: "Internal Server Error" });
  }

  if (error instanceof MethodNotAllowedException && error.allowed.length > 0) {
    return jsonResponse(error.statusCode, error.toBody(), { allow: error.allowed.join(", ") });
  }
  if (error instanceof HttpException) {
    return jsonResponse(error.statusCode, error.toBody());
  }

  const message = error instanceof Error ? error.message : String(error);
  debug("unhandled error: %O", error);
  logger?.error("Unhandled error in handler pipeline", {
    error: message,
    ...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
  });
  return jsonResponse(500, { message: "Internal Server Error" });
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body),
  };
}

export function normalizeResponse(result: unknown, status = 200): HttpResponse {
  if (isHttpResponse(result)) {
    return result;
  }

  if (result === undefined || result === null) {
    return { status: 204 };
  }

  if (typeof result === "string") {
    return { status, headers: { "content-type": "text/plain; charset=utf-8" }, body: result };
  }
  return jsonResponse(status, result);
}

function isHttpResponse(value: unknown): value is HttpResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "number"
  );
}
