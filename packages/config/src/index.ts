export { PlinthConfig, collectPrefixed, APP_VAR_PREFIX, SECRET_PREFIX } from "./env";
export type { Platform } from "./env";

export { ConfigService, ConfigNamespace } from "./config-service";
export type { ConfigNamespaceOptions } from "./config-service";
export { createConfigService } from "./create-config-service";
export { CONFIG_SERVICE } from "./tokens";

export type { ConfigBackend, ConfigStoreKind } from "./backends/types";
export { resolveBackend, isConfigStoreKind } from "./backends/resolve";
export { EmptyConfigBackend } from "./backends/empty";
export { EnvConfigBackend } from "./backends/env";
export { JsonFileConfigBackend } from "./backends/json-file";
