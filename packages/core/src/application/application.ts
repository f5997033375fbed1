import createDebug from "debug";
import type { HttpRequest, HttpResponse, PlinthLayer, PlinthLogger } from "@plinth/types";
import type { DependencyGraph } from "../di/dependency-graph";
import {
  GatewayTimeoutException,
  HttpException,
  MethodNotAllowedException,
  NotFoundException,
  ServiceUnavailableException,
} from "../errors/http-exception";
import { RequestCancelledError } from "../errors/runtime-errors";
import {
  executeHandlerPipeline,
  jsonResponse,
  toErrorResponse,
  type PreparedRoute,
} from "../handlers/pipeline";
import { disposeLayers } from "../layers/dispose";
import type {
  LifespanHook,
  LifespanManager,
  LifespanState,
  ShutdownHookOptions,
} from "../lifespan/lifespan-manager";
import type { ApiDocument } from "../openapi/types";
import type { ComposedRoute, RouteTable } from "../routing/route-table";
import type { SchemaRegistry } from "../schema/registry";
import { executeWebSocketPipeline, type WebSocketConnection } from "../websocket/connect";
import type { WebSocketChannel } from "../websocket/session";
import type { ApplicationSettings } from "./settings";

const debug = createDebug("plinth:core:application");

export type ApplicationParts = {
  table: RouteTable;
  prepared: ReadonlyMap<ComposedRoute, PreparedRoute>;
  registry: SchemaRegistry;
  graph: DependencyGraph;
  document: ApiDocument;
  lifespan: LifespanManager;
  settings: ApplicationSettings;
  layers: readonly PlinthLayer[];
  logger: PlinthLogger;
};

type Resolved =
  | { kind: "route"; prepared: PreparedRoute }
  | { kind: "response"; response: HttpResponse };

/**
 * A built application. Everything it serves was composed and checked by
 * `PlinthFactory.create`; a transport feeds it requests via `dispatch` and
 * WebSocket upgrades via `connect`.
 */
export class PlinthApplication {
  private released = false;

  constructor(private readonly parts: ApplicationParts) {}

  get state(): LifespanState {
    return this.parts.lifespan.state;
  }

  get routes(): RouteTable {
    return this.parts.table;
  }

  get document(): ApiDocument {
    return this.parts.document;
  }

  get schemas(): SchemaRegistry {
    return this.parts.registry;
  }

  get dependencies(): DependencyGraph {
    return this.parts.graph;
  }

  get settings(): ApplicationSettings {
    return this.parts.settings;
  }

  get logger(): PlinthLogger {
    return this.parts.logger;
  }

  onStartup(hook: LifespanHook, name?: string): this {
    this.parts.lifespan.onStartup(hook, name);
    return this;
  }

  onShutdown(hook: LifespanHook, options?: ShutdownHookOptions): this {
    this.parts.lifespan.onShutdown(hook, options);
    return this;
  }

  /** Runs startup hooks. On failure, singletons are closed before the error is rethrown. */
  async start(): Promise<void> {
    try {
      await this.parts.lifespan.start();
    } catch (error) {
      await this.release();
      throw error;
    }
    this.parts.logger.info("Application started", { routes: this.parts.table.size });
  }

  /**
   * Serves one HTTP request. Rejects with RequestCancelledError when the
   * request's signal aborts; the transport writes nothing in that case.
   */
  async dispatch(request: HttpRequest): Promise<HttpResponse> {
    const resolved = this.resolve(request);
    if (resolved.kind === "response") return resolved.response;

    const { prepared } = resolved;
    if (prepared.route.kind === "websocket") {
      return toErrorResponse(new HttpException(426, "Upgrade Required"));
    }

    const controller = new AbortController();
    const onClientAbort = (): void => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) onClientAbort();
    request.signal?.addEventListener("abort", onClientAbort, { once: true });

    let timedOut = false;
    const { requestTimeoutMs } = this.parts.settings;
    const timer =
      requestTimeoutMs === null
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort(new GatewayTimeoutException());
          }, requestTimeoutMs);

    try {
      return await executeHandlerPipeline(prepared, request, {
        graph: this.parts.graph,
        logger: this.parts.logger,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof RequestCancelledError && timedOut) {
        this.parts.logger.warn("Request timed out", {
          requestId: request.requestId,
          route: prepared.route.path,
          timeoutMs: requestTimeoutMs,
        });
        return toErrorResponse(new GatewayTimeoutException());
      }
      throw error;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onClientAbort);
    }
  }

  /**
   * Accepts a WebSocket upgrade. The connection is not subject to the request
   * timeout; its request-scoped dependencies are released when it closes.
   */
  async connect(request: HttpRequest, channel: WebSocketChannel): Promise<WebSocketConnection> {
    const resolved = this.resolve(request);
    if (resolved.kind === "response") return { response: resolved.response, session: null };

    const { prepared } = resolved;
    if (prepared.route.kind !== "websocket") {
      return { response: toErrorResponse(new HttpException(400, "Route does not accept WebSocket connections")), session: null };
    }

    return executeWebSocketPipeline(prepared, request, channel, {
      graph: this.parts.graph,
      logger: this.parts.logger,
      signal: request.signal ?? new AbortController().signal,
    });
  }

  /** Runs shutdown hooks, then closes singletons and disposes layers. */
  async shutdown(): Promise<void> {
    debug("shutdown");
    await this.parts.lifespan.shutdown();
    await this.release();
    this.parts.logger.info("Application stopped");
  }

  private async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.parts.graph.closeAll();
    await disposeLayers(this.parts.layers, this.parts.logger);
  }

  private resolve(request: HttpRequest): Resolved {
    if (this.state !== "Serving") {
      return { kind: "response", response: toErrorResponse(new ServiceUnavailableException("Application is not serving")) };
    }

    const { docsPath } = this.parts.settings;
    if (docsPath && request.method === "GET" && request.path === docsPath) {
      return { kind: "response", response: jsonResponse(200, this.parts.document) };
    }

    const match = this.parts.table.match(request.method, request.path);
    switch (match.kind) {
      case "not-found":
        return { kind: "response", response: toErrorResponse(new NotFoundException()) };
      case "method-not-allowed":
        return {
          kind: "response",
          response: toErrorResponse(new MethodNotAllowedException(undefined, undefined, match.allow)),
        };
      case "found": {
        const prepared = this.parts.prepared.get(match.route);
        if (!prepared) {
          return { kind: "response", response: toErrorResponse(new NotFoundException()) };
        }
        request.pathParams = match.params;
        return { kind: "route", prepared };
      }
    }
  }
}
