import { describe, it, expect } from "vitest";
import { isConfigStoreKind, resolveBackend } from "../../src/backends/resolve";
import { EmptyConfigBackend } from "../../src/backends/empty";
import { EnvConfigBackend } from "../../src/backends/env";
import { JsonFileConfigBackend } from "../../src/backends/json-file";

describe("resolveBackend", () => {
  it("should return EnvConfigBackend for the env store kind", () => {
    expect(resolveBackend("env")).toBeInstanceOf(EnvConfigBackend);
  });

  it("should return JsonFileConfigBackend for the json-file store kind", () => {
    expect(resolveBackend("json-file")).toBeInstanceOf(JsonFileConfigBackend);
  });

  it("should return EmptyConfigBackend for the empty store kind", () => {
    expect(resolveBackend("empty")).toBeInstanceOf(EmptyConfigBackend);
  });
});

describe("isConfigStoreKind", () => {
  it("should accept known kinds and reject anything else", () => {
    expect(isConfigStoreKind("env")).toBe(true);
    expect(isConfigStoreKind("json-file")).toBe(true);
    expect(isConfigStoreKind("secrets-manager")).toBe(false);
  });
});

describe("EmptyConfigBackend", () => {
  it("should return an empty map", async () => {
    const backend = new EmptyConfigBackend();
    const result = await backend.fetch("any-store");
    expect(result).toEqual(new Map());
  });
});
