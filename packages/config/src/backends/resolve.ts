import createDebug from "debug";
import type { ConfigBackend, ConfigStoreKind } from "./types";
import { EnvConfigBackend } from "./env";
import { JsonFileConfigBackend } from "./json-file";
import { EmptyConfigBackend } from "./empty";

const debug = createDebug("plinth:config:backend");

const STORE_KINDS: readonly ConfigStoreKind[] = ["env", "json-file", "empty"];

export function isConfigStoreKind(value: unknown): value is ConfigStoreKind {
  return STORE_KINDS.some((kind) => kind === value);
}

/** Selects the config backend for a store kind. */
export function resolveBackend(
  storeKind: ConfigStoreKind,
  env: NodeJS.ProcessEnv = process.env,
): ConfigBackend {
  let backend: ConfigBackend;
  switch (storeKind) {
    case "env":
      backend = new EnvConfigBackend(env);
      break;
    case "json-file":
      backend = new JsonFileConfigBackend();
      break;
    case "empty":
      backend = new EmptyConfigBackend();
      break;
  }
  debug("resolveBackend: storeKind=%s → %s", storeKind, backend.constructor.name);
  return backend;
}
