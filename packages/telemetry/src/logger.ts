import pino from "pino";
import type { LogLevel, PlinthLogger } from "@plinth/types";
import type { TelemetryConfig } from "./env";

export const REDACTED = "[REDACTED]";

/** pino-backed PlinthLogger. Attributes become fields of the log record. */
export class PlinthLoggerImpl implements PlinthLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.write("error", message, attributes);
  }

  child(name: string, attributes?: Record<string, unknown>): PlinthLoggerImpl {
    return new PlinthLoggerImpl(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): PlinthLoggerImpl {
    return new PlinthLoggerImpl(this.pinoLogger.child(attributes));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  /** Children created before the change keep their own level. */
  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  private write(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    if (attributes) this.pinoLogger[level](attributes, message);
    else this.pinoLogger[level](message);
  }
}

export function usesHumanFormat(config: Pick<TelemetryConfig, "logFormat" | "local">): boolean {
  return config.logFormat === "human" || (config.logFormat === "auto" && config.local);
}

function outputStreams(config: TelemetryConfig): pino.StreamEntry[] {
  const stdout = usesHumanFormat(config)
    ? // pino-pretty runs in a worker thread
      pino.transport({ target: "pino-pretty", options: { destination: 1 } })
    : pino.destination(1);

  const streams: pino.StreamEntry[] = [{ level: config.logLevel, stream: stdout }];
  if (config.logFilePath) {
    streams.push({ level: config.logLevel, stream: pino.destination(config.logFilePath) });
  }
  return streams;
}

/**
 * Builds the root logger. Output goes to stdout (and the configured log file)
 * unless `destination` is given.
 */
export function createLogger(
  config: TelemetryConfig,
  destination?: pino.DestinationStream,
): PlinthLoggerImpl {
  const logger = pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName, version: config.serviceVersion },
      redact: config.redactPaths.length > 0 ? { paths: config.redactPaths, censor: REDACTED } : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.multistream(outputStreams(config)),
  );
  return new PlinthLoggerImpl(logger);
}
