import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JsonFileConfigBackend } from "../../src/backends/json-file";

describe("JsonFileConfigBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "plinth-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should flatten nested objects into dotted keys and stringify scalars", async () => {
    // Arrange
    const file = join(dir, "config.json");
    await writeFile(
      file,
      JSON.stringify({
        logLevel: "debug",
        db: { host: "localhost", port: 5432, ssl: false },
        features: ["a", "b"],
        unset: null,
      }),
    );

    // Act
    const values = await new JsonFileConfigBackend().fetch(file);

    // Assert
    expect(Object.fromEntries(values)).toEqual({
      logLevel: "debug",
      "db.host": "localhost",
      "db.port": "5432",
      "db.ssl": "false",
      features: '["a","b"]',
    });
  });

  it("should return an empty map when the file does not exist", async () => {
    const values = await new JsonFileConfigBackend().fetch(join(dir, "missing.json"));

    expect(values.size).toBe(0);
  });

  it("should reject a file that does not hold a JSON object", async () => {
    const file = join(dir, "list.json");
    await writeFile(file, "[1, 2]");

    await expect(new JsonFileConfigBackend().fetch(file)).rejects.toThrow(
      `Config file "${file}" must contain a JSON object`,
    );
  });

  it("should propagate JSON parse errors", async () => {
    const file = join(dir, "broken.json");
    await writeFile(file, "{ not json");

    await expect(new JsonFileConfigBackend().fetch(file)).rejects.toThrow(SyntaxError);
  });
});
