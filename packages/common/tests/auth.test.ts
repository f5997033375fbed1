import { describe, it, expect } from "vitest";
import { extractUserId, parseAuthorizationHeader, decodeBasicCredentials } from "../src/auth";

describe("extractUserId", () => {
  it("should return undefined for null auth", () => {
    expect(extractUserId(null)).toBeUndefined();
  });

  it("should return undefined for empty auth", () => {
    expect(extractUserId({})).toBeUndefined();
  });

  it("should extract sub from wrapped claims", () => {
    expect(extractUserId({ bearerAuth: { claims: { sub: "user-42", aud: "app" } } })).toBe(
      "user-42",
    );
  });

  it("should extract a direct sub", () => {
    expect(extractUserId({ bearerAuth: { sub: "oidc-user-1" } })).toBe("oidc-user-1");
  });

  it("should extract a numeric userId as a string", () => {
    expect(extractUserId({ apiKey: { userId: 104932 } })).toBe("104932");
  });

  it("should extract user_id", () => {
    expect(extractUserId({ apiKey: { user_id: "u-789" } })).toBe("u-789");
  });

  it("should skip non-object scheme results", () => {
    expect(extractUserId({ basicAuth: true, apiKey: { sub: "k-1" } })).toBe("k-1");
  });
});

describe("parseAuthorizationHeader", () => {
  it("splits scheme and credentials", () => {
    expect(parseAuthorizationHeader("Bearer abc.def")).toEqual({
      scheme: "bearer",
      credentials: "abc.def",
    });
  });

  it("uses the first value of a repeated header", () => {
    expect(parseAuthorizationHeader(["Basic xyz", "Bearer other"])).toEqual({
      scheme: "basic",
      credentials: "xyz",
    });
  });

  it("returns null without credentials", () => {
    expect(parseAuthorizationHeader("Bearer")).toBeNull();
    expect(parseAuthorizationHeader("Bearer   ")).toBeNull();
    expect(parseAuthorizationHeader(undefined)).toBeNull();
  });
});

describe("decodeBasicCredentials", () => {
  it("decodes user and password", () => {
    const encoded = Buffer.from("admin:test-password").toString("base64");
    expect(decodeBasicCredentials(encoded)).toEqual({
      username: "admin",
      password: "test-password",
    });
  });

  it("returns null without a colon", () => {
    expect(decodeBasicCredentials(Buffer.from("admin").toString("base64"))).toBeNull();
  });
});
