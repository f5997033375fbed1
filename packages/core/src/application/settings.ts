import createDebug from "debug";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from "../lifespan/lifespan-manager";

const debug = createDebug("plinth:core:settings");

export const DEFAULT_DOCS_PATH = "/openapi.json";

export type ApplicationSettings = {
  shutdownTimeoutMs: number;
  /** `null` disables the HTTP request timeout. */
  requestTimeoutMs: number | null;
  /** `null` when the API document is not served. */
  docsPath: string | null;
};

export type SettingsOverrides = {
  shutdownTimeoutMs?: number;
  requestTimeoutMs?: number | null;
  docsPath?: string | null;
};

function readMillis(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/** Options win over `PLINTH_*` environment variables, which win over defaults. */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ApplicationSettings {
  const envDocsPath = env.PLINTH_DOCS_PATH;
  const docsPath =
    overrides.docsPath !== undefined
      ? overrides.docsPath
      : envDocsPath !== undefined
        ? envDocsPath
        : DEFAULT_DOCS_PATH;

  const settings: ApplicationSettings = {
    shutdownTimeoutMs:
      overrides.shutdownTimeoutMs ?? readMillis(env.PLINTH_SHUTDOWN_TIMEOUT_MS) ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    requestTimeoutMs:
      overrides.requestTimeoutMs !== undefined
        ? overrides.requestTimeoutMs
        : readMillis(env.PLINTH_REQUEST_TIMEOUT_MS),
    docsPath: docsPath ? docsPath : null,
  };
  debug("settings %o", settings);
  return settings;
}
