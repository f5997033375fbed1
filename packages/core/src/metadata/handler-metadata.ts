import type { HandlerMetadata } from "@plinth/types";

/**
 * Route metadata fixed at build time, overlaid by the values layers set while
 * serving one request. Writes never reach the route's own record.
 */
export class HandlerMetadataStore implements HandlerMetadata {
  private readonly overlay = new Map<string, unknown>();

  constructor(private readonly route: Readonly<Record<string, unknown>>) {}

  get<T = unknown>(key: string): T | undefined {
    const value = this.overlay.has(key) ? this.overlay.get(key) : this.routeValue(key);
    return value as T | undefined;
  }

  set(key: string, value: unknown): void {
    this.overlay.set(key, value);
  }

  has(key: string): boolean {
    return this.overlay.has(key) || Object.hasOwn(this.route, key);
  }

  private routeValue(key: string): unknown {
    return Object.hasOwn(this.route, key) ? this.route[key] : undefined;
  }
}
