import createDebug from "debug";
import { context as otelContext } from "@opentelemetry/api";
import type {
  DependencyResolver,
  HandlerContext,
  HandlerResponse,
  HttpRequest,
  LogLevel,
  PlinthLayer,
  PlinthTracer,
} from "@plinth/types";
import { defineService, extractUserId } from "@plinth/common";
import { isLogLevel, readTelemetryEnv, type TelemetryConfig } from "./env";
import { PlinthLoggerImpl, createLogger } from "./logger";
import { requestStore } from "./request-context";
import { extractTraceContext } from "./context";
import { createTracer } from "./tracer";

const debug = createDebug("plinth:telemetry");

/** Config keys checked, in order, for a log level override. */
const LOG_LEVEL_KEYS = ["PLINTH_LOG_LEVEL", "logLevel"] as const;

type ConfigLookup = {
  get(key: string): Promise<string | undefined>;
};

// Shares its id with the config package's CONFIG_SERVICE without importing it.
const CONFIG_LOOKUP = defineService<ConfigLookup>("ConfigService");

export type TelemetryLayerOptions = {
  config?: TelemetryConfig;
  logger?: PlinthLoggerImpl;
  tracer?: PlinthTracer;
};

function requestAttributes(request: HttpRequest): Record<string, unknown> {
  const userId = extractUserId(request.auth);
  return {
    requestId: request.requestId,
    method: request.method,
    path: request.path,
    matchedRoute: request.matchedRoute,
    clientIp: request.clientIp,
    userAgent: request.userAgent,
    ...(userId ? { userId } : {}),
  };
}

/**
 * System layer, first in every route's chain. Gives each request a child
 * logger carrying its attributes and, with tracing enabled, a server span
 * parented on the incoming trace context.
 */
export class TelemetryLayer implements PlinthLayer {
  readonly config: TelemetryConfig;
  readonly rootLogger: PlinthLoggerImpl;
  readonly tracer: PlinthTracer;
  private currentLevel: LogLevel;

  constructor(options: TelemetryLayerOptions = {}) {
    this.config = options.config ?? readTelemetryEnv();
    this.currentLevel = this.config.logLevel;
    this.rootLogger = options.logger ?? createLogger(this.config);
    this.tracer = options.tracer ?? createTracer(this.config);
    debug("format=%s level=%s tracing=%s", this.config.logFormat, this.currentLevel, this.config.tracingEnabled);
  }

  async handle(
    context: HandlerContext,
    next: () => Promise<HandlerResponse>,
  ): Promise<HandlerResponse> {
    await this.applyConfiguredLevel(context.dependencies);

    const { request } = context;
    const requestLogger = this.rootLogger.child("request", requestAttributes(request));
    context.logger = requestLogger;

    const startedAt = performance.now();
    const serve = async (): Promise<HandlerResponse> => {
      const response = await requestStore.run({ requestId: request.requestId, logger: requestLogger }, next);
      requestLogger.debug("Request completed", {
        status: response.status,
        durationMs: Math.round(performance.now() - startedAt),
      });
      return response;
    };

    if (!this.config.tracingEnabled) return serve();

    const route = request.matchedRoute ?? request.path;
    return otelContext.with(extractTraceContext(request), () =>
      this.tracer.withSpan(
        `${request.method} ${route}`,
        async (span) => {
          const response = await serve();
          span.setAttribute("http.response.status_code", response.status);
          return response;
        },
        { "http.request.method": request.method, "http.route": route, "url.path": request.path },
      ),
    );
  }

  /** A level set in the bound ConfigService replaces the root logger's level. */
  private async applyConfiguredLevel(dependencies: DependencyResolver): Promise<void> {
    if (!dependencies.has(CONFIG_LOOKUP)) return;

    let configured: LogLevel | undefined;
    try {
      const config = await dependencies.resolve(CONFIG_LOOKUP);
      for (const key of LOG_LEVEL_KEYS) {
        const value = (await config.get(key))?.toLowerCase();
        if (isLogLevel(value)) {
          configured = value;
          break;
        }
      }
    } catch (error) {
      debug("log level lookup failed, keeping %s: %O", this.currentLevel, error);
      return;
    }

    if (configured && configured !== this.currentLevel) {
      debug("log level %s → %s", this.currentLevel, configured);
      this.rootLogger.setLevel(configured);
      this.currentLevel = configured;
    }
  }
}
