import { collectPrefixed } from "../env";
import type { ConfigBackend } from "./types";

/**
 * Reads every environment variable whose name starts with the store id.
 * The prefix is stripped from the returned keys.
 */
export class EnvConfigBackend implements ConfigBackend {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async fetch(storeId: string): Promise<Map<string, string>> {
    return new Map(Object.entries(collectPrefixed(storeId, this.env)));
  }
}
