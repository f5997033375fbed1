export { readTelemetryEnv, isLogLevel } from "./env";
export type { TelemetryConfig, LogFormat } from "./env";
export { PlinthLoggerImpl, createLogger, usesHumanFormat, REDACTED } from "./logger";
export { OTelTracer, OTelSpan, createTracer, toAttributes } from "./tracer";
export { NoopTracer, NOOP_SPAN } from "./noop";
export { extractTraceContext } from "./context";
export { requestStore, getRequestLogger, getRequestId, ContextAwareLogger } from "./request-context";
export { TelemetryLayer } from "./telemetry-layer";
export type { TelemetryLayerOptions } from "./telemetry-layer";
export { LOGGER, TRACER } from "./tokens";
export { getLogger, getTracer } from "./helpers";
