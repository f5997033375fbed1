import createDebug from "debug";
import type { Schema } from "@plinth/types";
import type { ConfigBackend } from "./backends/types";

const debug = createDebug("plinth:config");

export type ConfigNamespaceOptions = {
  /** Used in error messages. Defaults to the store id. */
  name?: string;
  /** Values older than this are refreshed in the background. `null` never refreshes. */
  refreshIntervalMs?: number | null;
};

/**
 * Values from one config store. The first read fetches and caches them;
 * later reads past the refresh interval keep serving the cached values while
 * a single background fetch replaces them.
 */
export class ConfigNamespace {
  readonly name: string;
  private readonly refreshIntervalMs: number | null;
  private values: ReadonlyMap<string, string> | null = null;
  private loading: Promise<ReadonlyMap<string, string>> | null = null;
  private refreshing: Promise<void> | null = null;
  private fetchedAt = 0;

  constructor(
    private readonly backend: ConfigBackend,
    private readonly storeId: string,
    options: ConfigNamespaceOptions = {},
  ) {
    this.name = options.name ?? storeId;
    this.refreshIntervalMs = options.refreshIntervalMs ?? null;
  }

  async get(key: string): Promise<string | undefined> {
    const values = await this.load();
    return values.get(key);
  }

  async getOrThrow(key: string): Promise<string> {
    const value = await this.get(key);
    if (value === undefined) {
      throw new Error(`Config key "${key}" not found in namespace "${this.name}"`);
    }
    return value;
  }

  /** @throws Error when the value is present but not a finite number. */
  async getNumber(key: string): Promise<number | undefined> {
    const raw = await this.get(key);
    if (raw === undefined) return undefined;
    const parsed = Number(raw.trim());
    if (raw.trim() === "" || !Number.isFinite(parsed)) {
      throw new Error(`Config key "${key}" in namespace "${this.name}" is not a number: "${raw}"`);
    }
    return parsed;
  }

  /** Accepts true/false, 1/0, yes/no and on/off in any case. */
  async getBoolean(key: string): Promise<boolean | undefined> {
    const raw = await this.get(key);
    if (raw === undefined) return undefined;
    switch (raw.trim().toLowerCase()) {
      case "true":
      case "1":
      case "yes":
      case "on":
        return true;
      case "false":
      case "0":
      case "no":
      case "off":
        return false;
      default:
        throw new Error(`Config key "${key}" in namespace "${this.name}" is not a boolean: "${raw}"`);
    }
  }

  async getAll(): Promise<Readonly<Record<string, string>>> {
    return Object.fromEntries(await this.load());
  }

  async parse<T>(schema: Schema<T>): Promise<T> {
    return schema.parse(await this.getAll());
  }

  /** Fetches the store now and replaces the cached values. */
  async refresh(): Promise<void> {
    const fresh = await this.backend.fetch(this.storeId);
    this.values = fresh;
    this.fetchedAt = Date.now();
    debug("namespace %s: refreshed, %d keys", this.name, fresh.size);
  }

  private async load(): Promise<ReadonlyMap<string, string>> {
    if (this.values === null) {
      this.loading ??= this.firstFetch();
      return this.loading;
    }

    const age = Date.now() - this.fetchedAt;
    if (this.refreshIntervalMs !== null && age >= this.refreshIntervalMs && !this.refreshing) {
      debug("namespace %s: stale (age=%dms), refreshing in background", this.name, age);
      this.refreshing = this.refresh()
        .catch((error: unknown) => {
          debug("namespace %s: refresh failed, serving stale values: %O", this.name, error);
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.values;
  }

  private async firstFetch(): Promise<ReadonlyMap<string, string>> {
    debug("namespace %s: first fetch", this.name);
    try {
      const values = await this.backend.fetch(this.storeId);
      this.values = values;
      this.fetchedAt = Date.now();
      debug("namespace %s: %d keys loaded", this.name, values.size);
      return values;
    } finally {
      this.loading = null;
    }
  }
}

/**
 * Application configuration, bound as the singleton CONFIG_SERVICE. With a
 * single namespace registered, the shorthand accessors read from it.
 */
export class ConfigService {
  private readonly namespaces = new Map<string, ConfigNamespace>();

  registerNamespace(name: string, namespace: ConfigNamespace): void {
    if (this.namespaces.has(name)) {
      throw new Error(`Config namespace "${name}" is already registered`);
    }
    debug("registerNamespace: %s", name);
    this.namespaces.set(name, namespace);
  }

  namespace(name: string): ConfigNamespace {
    const ns = this.namespaces.get(name);
    if (!ns) {
      throw new Error(`Config namespace "${name}" not registered`);
    }
    return ns;
  }

  namespaceNames(): string[] {
    return [...this.namespaces.keys()];
  }

  async get(key: string): Promise<string | undefined> {
    return this.onlyNamespace().get(key);
  }

  async getOrThrow(key: string): Promise<string> {
    return this.onlyNamespace().getOrThrow(key);
  }

  async getNumber(key: string): Promise<number | undefined> {
    return this.onlyNamespace().getNumber(key);
  }

  async getBoolean(key: string): Promise<boolean | undefined> {
    return this.onlyNamespace().getBoolean(key);
  }

  async getAll(): Promise<Readonly<Record<string, string>>> {
    return this.onlyNamespace().getAll();
  }

  async parse<T>(schema: Schema<T>): Promise<T> {
    return this.onlyNamespace().parse(schema);
  }

  private onlyNamespace(): ConfigNamespace {
    const [only, ...rest] = this.namespaces.values();
    if (!only) {
      throw new Error("No config namespaces registered");
    }
    if (rest.length > 0) {
      throw new Error(
        `Config namespaces ${this.namespaceNames().join(", ")} are registered; use config.namespace(name)`,
      );
    }
    return only;
  }
}
