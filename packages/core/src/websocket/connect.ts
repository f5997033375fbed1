import createDebug from "debug";
import type { HttpRequest, HttpResponse } from "@plinth/types";
import { buildHandlerRequest, buildRouteContext } from "../handlers/context";
import { runRoute, type PipelineOptions, type PreparedRoute } from "../handlers/pipeline";
import { WebSocketSession, type WebSocketChannel } from "./session";

const debug = createDebug("plinth:core:websocket");

export type WebSocketConnection = {
  /** `101` when the handler accepted the connection; an error response otherwise. */
  response: HttpResponse;
  session: WebSocketSession | null;
};

/**
 * Runs a WebSocket route: layers, validation and dependency resolution happen
 * as for HTTP, then the handler receives a session that owns the request
 * scope until the connection ends.
 */
export async function executeWebSocketPipeline(
  prepared: PreparedRoute,
  request: HttpRequest,
  channel: WebSocketChannel,
  options: PipelineOptions,
): Promise<WebSocketConnection> {
  const { route } = prepared;
  let session: WebSocketSession | null = null;

  const response = await runRoute(prepared, request, options, async ({ context, scope, args }) => {
    const req = buildHandlerRequest(context.request, context.metadata);
    const ctx = buildRouteContext(context.request, context.metadata, scope, options.signal, context.logger);
    const opened = new WebSocketSession(channel, () => scope.release(), context.logger ?? options.logger);
    session = opened;

    try {
      await route.handler(opened, req, ctx, ...args);
    } catch (error) {
      await opened.close(1011, "Internal error");
      throw error;
    }

    debug("session open on %s", route.path);
    return { response: { status: 101 }, keepScope: true };
  });

  return { response, session: response.status === 101 ? session : null };
}
