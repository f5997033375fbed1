import { describe, it, expect, vi, afterEach } from "vitest";
import pino from "pino";
import { NoopTracer, PlinthLoggerImpl } from "@plinth/telemetry";
import { PlinthFactory, type CreateOptions } from "../../src/application/factory";
import { mockRequest } from "../../src/testing/test-app";
import { RouterNode } from "../../src/routing/router-node";
import { httpDelete, httpGet, websocket } from "../../src/handlers/definition";
import { RequestCancelledError } from "../../src/errors/runtime-errors";
import { FakeChannel } from "../fixtures/channel";

const never = () => new Promise<string>(() => undefined);

function root(): RouterNode {
  const items = new RouterNode("/items").route(
    httpGet("/{id}", (req) => ({ id: req.params.id })),
    httpDelete("/{id}", () => undefined),
    httpGet("/slow", never),
  );
  const secured = new RouterNode("/me").secure("bearer").route(httpGet("/", (req) => req.auth));
  return new RouterNode("/")
    .route(websocket("/events", {}, (session) => session.send("welcome")))
    .include(items, secured);
}

function options(overrides: CreateOptions = {}): CreateOptions {
  return {
    systemLayers: [],
    logger: new PlinthLoggerImpl(pino({ enabled: false })),
    tracer: new NoopTracer(),
    env: {},
    securitySchemes: {
      bearer: {
        type: "http",
        scheme: "bearer",
        authenticate: (credentials) =>
          credentials.type === "bearer" && credentials.token === "test-token" ? { userId: "u-1" } : null,
      },
    },
    ...overrides,
  };
}

describe("PlinthApplication", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("answers 503 until started", async () => {
    const app = await PlinthFactory.create(root(), options());

    const response = await app.dispatch(mockRequest("GET", "/items/1"));

    expect(response.status).toBe(503);
    expect(response.body).toBe('{"message":"Application is not serving"}');
  });

  it("answers 503 after shutdown", async () => {
    const app = await PlinthFactory.create(root(), options());
    await app.start();
    await app.shutdown();

    expect((await app.dispatch(mockRequest("GET", "/items/1"))).status).toBe(503);
  });

  it("sets path params from the matched template", async () => {
    const app = await PlinthFactory.createTestingApp(root(), options());

    const response = await app.inject(mockRequest("GET", "/items/a%2Fb"));

    expect(response.body).toBe('{"id":"a/b"}');
  });

  it("answers 404 for unknown paths", async () => {
    const app = await PlinthFactory.createTestingApp(root(), options());

    const response = await app.inject(mockRequest("GET", "/nothing"));

    expect(response).toEqual({
      status: 404,
      headers: { "content-type": "application/json" },
      body: '{"message":"Not Found"}',
    });
  });

  it("answers 405 with an allow header when only the method differs", async () => {
    const app = await PlinthFactory.createTestingApp(root(), options());

    const response = await app.inject(mockRequest("PUT", "/items/1"));

    expect(response.status).toBe(405);
    expect(response.headers).toEqual({ "content-type": "application/json", allow: "GET, DELETE" });
  });

  it("enforces the security requirement of a router", async () => {
    // Arrange
    const app = await PlinthFactory.createTestingApp(root(), options());

    // Act
    const missing = await app.inject(mockRequest("GET", "/me"));
    const invalid = await app.inject(mockRequest("GET", "/me", { headers: { authorization: "Bearer wrong" } }));
    const accepted = await app.inject(
      mockRequest("GET", "/me", { headers: { authorization: "Bearer test-token" } }),
    );

    // Assert
    expect(missing.body).toBe('{"message":"Missing credentials"}');
    expect(invalid.body).toBe('{"message":"Invalid credentials"}');
    expect(accepted.body).toBe('{"bearer":{"userId":"u-1"}}');
  });

  it("answers 504 when the request timeout elapses", async () => {
    // Arrange
    vi.useFakeTimers();
    const app = await PlinthFactory.createTestingApp(root(), options({ requestTimeoutMs: 1000 }));

    // Act
    const pending = app.inject(mockRequest("GET", "/items/slow"));
    await vi.advanceTimersByTimeAsync(1000);

    // Assert
    expect((await pending).status).toBe(504);
  });

  it("rethrows cancellation when the client disconnects", async () => {
    // Arrange
    const app = await PlinthFactory.createTestingApp(root(), options());
    const client = new AbortController();

    // Act
    const pending = app.inject(mockRequest("GET", "/items/slow", { signal: client.signal }));
    client.abort();

    // Assert
    await expect(pending).rejects.toThrow(RequestCancelledError);
  });

  it("answers 426 when a WebSocket route is requested over plain HTTP", async () => {
    const app = await PlinthFactory.createTestingApp(root(), options());

    const response = await app.inject(mockRequest("GET", "/events"));

    expect(response.status).toBe(426);
  });

  it("accepts a WebSocket connection on a WebSocket route", async () => {
    // Arrange
    const app = await PlinthFactory.createTestingApp(root(), options());
    const channel = new FakeChannel();

    // Act
    const connection = await app.connect(mockRequest("GET", "/events"), channel);

    // Assert
    expect(connection.response.status).toBe(101);
    expect(channel.sent).toEqual(["welcome"]);
  });

  it("refuses a WebSocket connection on an HTTP route", async () => {
    const app = await PlinthFactory.createTestingApp(root(), options());

    const connection = await app.connect(mockRequest("GET", "/items/1"), new FakeChannel());

    expect(connection).toEqual({
      response: {
        status: 400,
        headers: { "content-type": "application/json" },
        body: '{"message":"Route does not accept WebSocket connections"}',
      },
      session: null,
    });
  });
});
