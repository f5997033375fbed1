import { AsyncLocalStorage } from "node:async_hooks";
import type { LogLevel, PlinthLogger } from "@plinth/types";

type RequestStore = {
  requestId: string;
  logger: PlinthLogger;
};

export const requestStore = new AsyncLocalStorage<RequestStore>();

/**
 * The logger TelemetryLayer created for the request being served, anywhere in
 * its async call chain. `undefined` in startup hooks and background work.
 */
export function getRequestLogger(): PlinthLogger | undefined {
  return requestStore.getStore()?.logger;
}

export function getRequestId(): string | undefined {
  return requestStore.getStore()?.requestId;
}

/**
 * Bound to LOGGER. Logs through the request logger while a request is being
 * served and through the root logger otherwise, so singletons pick up
 * request attributes.
 */
export class ContextAwareLogger implements PlinthLogger {
  constructor(private readonly rootLogger: PlinthLogger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.forward("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.forward("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.forward("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.forward("error", message, attributes);
  }

  /** The child is fixed to whichever logger is current when it is created. */
  child(name: string, attributes?: Record<string, unknown>): PlinthLogger {
    return this.current().child(name, attributes);
  }

  withContext(attributes: Record<string, unknown>): PlinthLogger {
    return this.current().withContext(attributes);
  }

  private current(): PlinthLogger {
    return getRequestLogger() ?? this.rootLogger;
  }

  private forward(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    this.current()[level](message, attributes);
  }
}
