import { describe, it, expect } from "vitest";
import { EnvConfigBackend } from "../../src/backends/env";

describe("EnvConfigBackend", () => {
  it("should return variables under the store id prefix with the prefix stripped", async () => {
    // Arrange
    const backend = new EnvConfigBackend({
      PLINTH_APP_DB_HOST: "localhost",
      PLINTH_APP_DB_PORT: "5432",
      PLINTH_SECRET_TOKEN: "test-secret",
    });

    // Act
    const values = await backend.fetch("PLINTH_APP_");

    // Assert
    expect(Object.fromEntries(values)).toEqual({ DB_HOST: "localhost", DB_PORT: "5432" });
  });

  it("should return an empty map when nothing matches", async () => {
    const backend = new EnvConfigBackend({ UNRELATED: "1" });

    const values = await backend.fetch("PLINTH_APP_");

    expect(values.size).toBe(0);
  });
});
