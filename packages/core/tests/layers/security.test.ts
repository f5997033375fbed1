import { describe, it, expect, vi } from "vitest";
import { SecurityLayer, extractCredentials, type SecuritySchemeOptions } from "../../src/layers/security";
import { UnauthorizedException } from "../../src/errors/http-exception";
import { makeContext, makeRequest } from "../fixtures/context";

const bearer: SecuritySchemeOptions = { type: "http", scheme: "bearer" };
const apiKey: SecuritySchemeOptions = { type: "apiKey", in: "header", name: "X-Api-Key" };
const ok = { status: 200 };

describe("extractCredentials", () => {
  it("reads a bearer token", () => {
    const request = makeRequest({ headers: { authorization: "Bearer test-token" } });

    expect(extractCredentials(bearer, request)).toEqual({ type: "bearer", token: "test-token" });
  });

  it("decodes basic credentials", () => {
    const encoded = Buffer.from("ada:test-secret").toString("base64");
    const request = makeRequest({ headers: { authorization: `Basic ${encoded}` } });

    expect(extractCredentials({ type: "http", scheme: "basic" }, request)).toEqual({
      type: "basic",
      username: "ada",
      password: "test-secret",
    });
  });

  it("ignores an authorization header for a different scheme", () => {
    const request = makeRequest({ headers: { authorization: "Basic abc" } });

    expect(extractCredentials(bearer, request)).toBeNull();
  });

  it("reads an API key from the lower-cased header", () => {
    const request = makeRequest({ headers: { "x-api-key": "test-key" } });

    expect(extractCredentials(apiKey, request)).toEqual({ type: "apiKey", key: "test-key" });
  });

  it("reads an API key from the query string", () => {
    const request = makeRequest({ query: { api_key: ["first", "second"] } });

    expect(extractCredentials({ type: "apiKey", in: "query", name: "api_key" }, request)).toEqual({
      type: "apiKey",
      key: "first",
    });
  });
});

describe("SecurityLayer", () => {
  it("accepts presented credentials when the scheme has no authenticate callback", async () => {
    // Arrange
    const layer = new SecurityLayer(["bearer"], { bearer });
    const context = makeContext({ headers: { authorization: "Bearer test-token" } });
    const next = vi.fn().mockResolvedValue(ok);

    // Act
    const response = await layer.handle(context, next);

    // Assert
    expect(response).toBe(ok);
    expect(context.request.auth).toEqual({ bearer: { type: "bearer", token: "test-token" } });
  });

  it("stores the authenticate result under the scheme name", async () => {
    // Arrange
    const authenticate = vi.fn().mockResolvedValue({ userId: "u-1" });
    const layer = new SecurityLayer(["bearer"], { bearer: { ...bearer, authenticate } });
    const context = makeContext({ headers: { authorization: "Bearer test-token" } });

    // Act
    await layer.handle(context, vi.fn().mockResolvedValue(ok));

    // Assert
    expect(authenticate).toHaveBeenCalledWith({ type: "bearer", token: "test-token" }, context.request);
    expect(context.request.auth).toEqual({ bearer: { userId: "u-1" } });
  });

  it("falls through to the next scheme when the first rejects", async () => {
    // Arrange
    const layer = new SecurityLayer(["bearer", "apiKey"], {
      bearer: { ...bearer, authenticate: () => false },
      apiKey,
    });
    const context = makeContext({
      headers: { authorization: "Bearer expired", "x-api-key": "test-key" },
    });

    // Act
    await layer.handle(context, vi.fn().mockResolvedValue(ok));

    // Assert
    expect(context.request.auth).toEqual({ apiKey: { type: "apiKey", key: "test-key" } });
  });

  it("rejects a request with no credentials as missing", async () => {
    const layer = new SecurityLayer(["bearer", "apiKey"], { bearer, apiKey });
    const next = vi.fn();

    await expect(layer.handle(makeContext(), next)).rejects.toThrow(new UnauthorizedException("Missing credentials"));
    expect(next).not.toHaveBeenCalled();
  });

  it("rejects credentials every scheme refused as invalid", async () => {
    const layer = new SecurityLayer(["bearer"], { bearer: { ...bearer, authenticate: () => null } });
    const context = makeContext({ headers: { authorization: "Bearer test-token" } });

    await expect(layer.handle(context, vi.fn())).rejects.toMatchObject({
      statusCode: 401,
      message: "Invalid credentials",
    });
  });
});
