export type ConfigStoreKind = "env" | "json-file" | "empty";

/** Backend that knows how to fetch config values from a specific store. */
export interface ConfigBackend {
  fetch(storeId: string): Promise<Map<string, string>>;
}
