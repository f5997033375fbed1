import type { LogLevel } from "@plinth/types";

export type LogFormat = "json" | "human" | "auto";

export type TelemetryConfig = {
  tracingEnabled: boolean;
  serviceName: string;
  serviceVersion: string;
  logLevel: LogLevel;
  /** `auto` is human readable on a local platform and JSON elsewhere. */
  logFormat: LogFormat;
  logFilePath: string | null;
  /** pino redact paths, e.g. `password` or `auth.token`. */
  redactPaths: string[];
  /** True when PLINTH_PLATFORM is unset or "local". */
  local: boolean;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: unknown): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function readTelemetryEnv(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  const rawLevel = env.PLINTH_LOG_LEVEL?.toLowerCase();
  const rawFormat = env.PLINTH_LOG_FORMAT?.toLowerCase();
  const platform = env.PLINTH_PLATFORM?.toLowerCase();

  return {
    tracingEnabled: env.PLINTH_TELEMETRY_ENABLED === "true",
    serviceName: env.OTEL_SERVICE_NAME ?? "plinth-app",
    serviceVersion: env.OTEL_SERVICE_VERSION ?? "0.0.0",
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: env.PLINTH_LOG_FILE_PATH || null,
    redactPaths: splitList(env.PLINTH_LOG_REDACT_KEYS),
    local: !platform || platform === "local",
  };
}
