import type { PlinthTracer, PlinthSpan } from "@plinth/types";

const ignore = (): void => undefined;

export const NOOP_SPAN: PlinthSpan = Object.freeze({
  setAttribute: ignore,
  setAttributes: ignore,
  recordError: ignore,
  setOk: ignore,
  end: ignore,
});

/** Tracer used when tracing is disabled. `withSpan` still runs its callback. */
export class NoopTracer implements PlinthTracer {
  startSpan(): PlinthSpan {
    return NOOP_SPAN;
  }

  async withSpan<T>(_name: string, fn: (span: PlinthSpan) => T | Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }
}
