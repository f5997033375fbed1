import { propagation, ROOT_CONTEXT, type Context } from "@opentelemetry/api";
import type { HttpRequest } from "@plinth/types";

/**
 * Parent context for a request's server span, read from its `traceparent`
 * and `tracestate` values by the globally registered propagator.
 */
export function extractTraceContext(request: Pick<HttpRequest, "traceContext">): Context {
  if (!request.traceContext) return ROOT_CONTEXT;
  return propagation.extract(ROOT_CONTEXT, request.traceContext);
}
