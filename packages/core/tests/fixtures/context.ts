import type { DependencyResolver, HandlerContext, HttpRequest } from "@plinth/types";
import { HandlerMetadataStore } from "../../src/metadata/handler-metadata";

export function makeRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    method: "GET",
    path: "/test",
    pathParams: {},
    query: {},
    headers: {},
    cookies: {},
    textBody: null,
    binaryBody: null,
    contentType: null,
    requestId: "req-1",
    requestTime: "2026-01-01T00:00:00.000Z",
    auth: null,
    clientIp: null,
    traceContext: null,
    userAgent: null,
    matchedRoute: null,
    ...overrides,
  };
}

export const emptyResolver: DependencyResolver = {
  resolve: async (descriptor) => {
    throw new Error(`No binding for ${descriptor.id}`);
  },
  has: () => false,
};

export function makeContext(overrides: Partial<HttpRequest> = {}): HandlerContext {
  return {
    request: makeRequest(overrides),
    dependencies: emptyResolver,
    metadata: new HandlerMetadataStore({}),
  };
}
