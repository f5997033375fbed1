import createDebug from "debug";
import type { ConfigStoreKind } from "./backends/types";
import { isConfigStoreKind, resolveBackend } from "./backends/resolve";
import { ConfigService, ConfigNamespace } from "./config-service";
import { APP_VAR_PREFIX } from "./env";

const debug = createDebug("plinth:config");

const CONFIG_PREFIX = "PLINTH_CONFIG_";
const STORE_ID_SUFFIX = "_STORE_ID";

type DiscoveredNamespace = {
  name: string;
  storeId: string;
  storeKind: ConfigStoreKind;
};

/**
 * Builds the ConfigService bound at the root of every application that does
 * not bind its own.
 *
 * Namespaces come from the environment:
 *   - `PLINTH_CONFIG_STORE_ID` (+ `PLINTH_CONFIG_STORE_KIND`) for a single "default" namespace
 *   - `PLINTH_CONFIG_<NS>_STORE_ID` (+ `PLINTH_CONFIG_<NS>_STORE_KIND`) for several
 *
 * Without either, a "default" namespace reads `PLINTH_APP_*` variables.
 */
export function createConfigService(env: NodeJS.ProcessEnv = process.env): ConfigService {
  const service = new ConfigService();
  const refreshFromEnv = env.PLINTH_CONFIG_REFRESH_INTERVAL_MS;

  for (const ns of discoverNamespaces(env)) {
    const backend = resolveBackend(ns.storeKind, env);
    const refreshIntervalMs = resolveRefreshInterval(ns.storeKind, refreshFromEnv);
    debug(
      "namespace %s: store=%s kind=%s refresh=%s",
      ns.name,
      ns.storeId,
      ns.storeKind,
      refreshIntervalMs,
    );
    service.registerNamespace(
      ns.name,
      new ConfigNamespace(backend, ns.storeId, { name: ns.name, refreshIntervalMs }),
    );
  }

  return service;
}

function discoverNamespaces(env: NodeJS.ProcessEnv): DiscoveredNamespace[] {
  const defaultStoreId = env[`${CONFIG_PREFIX}STORE_ID`];
  if (defaultStoreId) {
    return [
      {
        name: "default",
        storeId: defaultStoreId,
        storeKind: storeKindOf(env[`${CONFIG_PREFIX}STORE_KIND`], "json-file"),
      },
    ];
  }

  const namespaces: DiscoveredNamespace[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(CONFIG_PREFIX) || !key.endsWith(STORE_ID_SUFFIX) || !value) continue;

    const nsName = key.slice(CONFIG_PREFIX.length, key.length - STORE_ID_SUFFIX.length);
    if (!nsName) continue;

    namespaces.push({
      name: nsName.toLowerCase(),
      storeId: value,
      storeKind: storeKindOf(env[`${CONFIG_PREFIX}${nsName}_STORE_KIND`], "json-file"),
    });
  }

  if (namespaces.length > 0) return namespaces;

  return [{ name: "default", storeId: APP_VAR_PREFIX, storeKind: "env" }];
}

function storeKindOf(raw: string | undefined, fallback: ConfigStoreKind): ConfigStoreKind {
  if (raw === undefined) return fallback;
  if (!isConfigStoreKind(raw)) {
    throw new Error(`Unknown config store kind "${raw}"`);
  }
  return raw;
}

/** Environment reads are always fresh enough; file stores refresh every 30s unless overridden. */
function resolveRefreshInterval(storeKind: ConfigStoreKind, fromEnv?: string): number | null {
  if (fromEnv !== undefined) {
    const ms = Number.parseInt(fromEnv, 10);
    return Number.isNaN(ms) || ms === 0 ? null : ms;
  }
  return storeKind === "json-file" ? 30_000 : null;
}
