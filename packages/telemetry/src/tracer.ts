import {
  trace,
  context as otelContext,
  SpanStatusCode,
  type AttributeValue,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { PlinthTracer, PlinthSpan } from "@plinth/types";
import type { TelemetryConfig } from "./env";
import { NoopTracer } from "./noop";

function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return value.map(String);
  }
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

export function toAttributes(attributes?: Record<string, unknown>): Attributes | undefined {
  if (!attributes) return undefined;
  const result: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    const converted = toAttributeValue(value);
    if (converted !== undefined) result[key] = converted;
  }
  return result;
}

function asError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/** PlinthTracer over an OpenTelemetry tracer, by default the global provider's. */
export class OTelTracer implements PlinthTracer {
  private readonly tracer: Pick<Tracer, "startSpan">;

  constructor(tracer?: Pick<Tracer, "startSpan">) {
    this.tracer = tracer ?? trace.getTracer("plinth");
  }

  startSpan(name: string, attributes?: Record<string, unknown>): PlinthSpan {
    return new OTelSpan(this.tracer.startSpan(name, { attributes: toAttributes(attributes) }));
  }

  /**
   * Runs `fn` with a new span active in the current context. The span ends
   * when `fn` settles; a thrown error is recorded and rethrown.
   */
  async withSpan<T>(
    name: string,
    fn: (span: PlinthSpan) => T | Promise<T>,
    attributes?: Record<string, unknown>,
  ): Promise<T> {
    const span = this.tracer.startSpan(name, { attributes: toAttributes(attributes) }, otelContext.active());
    const wrapped = new OTelSpan(span);

    return otelContext.with(trace.setSpan(otelContext.active(), span), async () => {
      try {
        const result = await fn(wrapped);
        wrapped.setOk();
        return result;
      } catch (error) {
        wrapped.recordError(asError(error));
        throw error;
      } finally {
        span.end();
      }
    });
  }
}

export class OTelSpan implements PlinthSpan {
  constructor(private readonly span: Span) {}

  setAttribute(key: string, value: string | number | boolean): void {
    this.span.setAttribute(key, value);
  }

  setAttributes(attributes: Record<string, string | number | boolean>): void {
    this.span.setAttributes(attributes);
  }

  recordError(error: Error): void {
    this.span.recordException(error);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  }

  setOk(): void {
    this.span.setStatus({ code: SpanStatusCode.OK });
  }

  end(): void {
    this.span.end();
  }
}

export function createTracer(config: Pick<TelemetryConfig, "tracingEnabled">): PlinthTracer {
  return config.tracingEnabled ? new OTelTracer() : new NoopTracer();
}
