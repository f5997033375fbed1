import type { PlinthLayer, PlinthTracer } from "@plinth/types";
import { TelemetryLayer, type PlinthLoggerImpl, type TelemetryConfig } from "@plinth/telemetry";

export type SystemLayerOptions = {
  telemetry: TelemetryConfig;
  logger: PlinthLoggerImpl;
  tracer: PlinthTracer;
};

/** Layers that run before any application layer. Telemetry always comes first. */
export function createDefaultSystemLayers(options: SystemLayerOptions): PlinthLayer[] {
  return [
    new TelemetryLayer({ config: options.telemetry, logger: options.logger, tracer: options.tracer }),
  ];
}
