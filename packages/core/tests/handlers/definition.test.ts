import { describe, it, expect } from "vitest";
import { defineService } from "@plinth/common";
import {
  createRoute,
  httpDelete,
  httpGet,
  httpPatch,
  httpPost,
  httpPut,
  websocket,
} from "../../src/handlers/definition";
import { integer, object, string } from "../../src/schema/shapes";

describe("createRoute", () => {
  it("fills in defaults for an undecorated route", () => {
    const handler = () => "ok";

    const route = createRoute({ method: "GET", path: "/health" }, handler);

    expect(route).toEqual({
      kind: "http",
      method: "GET",
      path: "/health",
      params: undefined,
      query: undefined,
      headers: undefined,
      body: undefined,
      response: undefined,
      status: 200,
      dependencies: [],
      tags: [],
      security: undefined,
      summary: undefined,
      description: undefined,
      operationId: undefined,
      deprecated: undefined,
      layers: [],
      includeInDocs: true,
      metadata: {},
      handler,
    });
  });

  it("keeps declared shapes, dependencies and documentation fields", () => {
    // Arrange
    const Database = defineService<{ find(id: number): string }>("Database");
    const params = object({ id: integer() });

    // Act
    const route = createRoute(
      {
        method: "GET",
        path: "/users/{id}",
        params,
        inject: [Database],
        tags: ["users"],
        security: ["bearer"],
        summary: "Fetch a user",
        operationId: "fetchUser",
        includeInDocs: false,
        metadata: { cache: 60 },
      },
      (req, _ctx, db) => db.find(req.params.id),
    );

    // Assert
    expect(route).toMatchObject({
      params,
      dependencies: [Database],
      tags: ["users"],
      security: ["bearer"],
      summary: "Fetch a user",
      operationId: "fetchUser",
      includeInDocs: false,
      metadata: { cache: 60 },
    });
  });

  it("copies option arrays so later mutation does not leak into the route", () => {
    const tags = ["a"];

    const route = createRoute({ method: "GET", path: "/", tags }, () => "ok");
    tags.push("b");

    expect(route.tags).toEqual(["a"]);
  });
});

describe("shorthands", () => {
  it.each([
    ["GET", 200, httpGet],
    ["POST", 201, httpPost],
    ["PUT", 200, httpPut],
    ["PATCH", 200, httpPatch],
    ["DELETE", 200, httpDelete],
  ] as const)("%s defaults to status %i", (method, status, shorthand) => {
    const route = shorthand("/items", () => "ok");

    expect(route.method).toBe(method);
    expect(route.status).toBe(status);
  });

  it("accepts options before the handler", () => {
    const body = object({ name: string() });

    const route = httpPost("/items", { body, status: 202 }, (req) => ({ received: req.body.name }));

    expect(route.body).toBe(body);
    expect(route.status).toBe(202);
  });

  it("requires a handler when options are given", () => {
    const call = () => Reflect.apply(httpGet, undefined, ["/items", { tags: ["x"] }]);

    expect(call).toThrow("GET /items: a handler function is required");
  });
});

describe("websocket", () => {
  it("declares a GET route of kind websocket with status 101", () => {
    const route = websocket("/chat", { tags: ["chat"] }, async () => undefined);

    expect(route).toMatchObject({ kind: "websocket", method: "GET", path: "/chat", status: 101, tags: ["chat"] });
  });
});
