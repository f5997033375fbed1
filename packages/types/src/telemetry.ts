export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger bound to LOGGER. Independent of whether tracing is enabled. */
export interface PlinthLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a named child logger. Adds the name to all log records. */
  child(name: string, attributes?: Record<string, unknown>): PlinthLogger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): PlinthLogger;
}

/** Wrapper around OTel tracing for custom span capture. */
export interface PlinthTracer {
  startSpan(name: string, attributes?: Record<string, unknown>): PlinthSpan;
  withSpan<T>(
    name: string,
    fn: (span: PlinthSpan) => T | Promise<T>,
    attributes?: Record<string, unknown>,
  ): Promise<T>;
}

export interface PlinthSpan {
  setAttribute(key: string, value: string | number | boolean): void;
  setAttributes(attributes: Record<string, string | number | boolean>): void;
  recordError(error: Error): void;
  setOk(): void;
  end(): void;
}
