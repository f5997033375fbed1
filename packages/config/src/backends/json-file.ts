import { readFile } from "node:fs/promises";
import type { ConfigBackend } from "./types";

/**
 * Reads a JSON object from the file named by the store id.
 * Nested objects are flattened into dotted keys; scalars are stringified.
 * A missing file yields an empty map, any other read or parse failure is thrown.
 */
export class JsonFileConfigBackend implements ConfigBackend {
  async fetch(storeId: string): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(storeId, "utf8");
    } catch (error) {
      if (isNotFound(error)) return new Map();
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new Error(`Config file "${storeId}" must contain a JSON object`);
    }

    const values = new Map<string, string>();
    flatten(parsed, "", values);
    return values;
  }
}

function flatten(source: Record<string, unknown>, prefix: string, into: Map<string, string>): void {
  for (const [key, value] of Object.entries(source)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      flatten(value, path, into);
    } else if (value !== null && value !== undefined) {
      into.set(path, typeof value === "string" ? value : JSON.stringify(value));
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
