import { describe, it, expect } from "vitest";
import { defineService } from "@plinth/common";
import { compose } from "../../src/routing/compose";
import { RouterNode } from "../../src/routing/router-node";
import { routeLabel } from "../../src/routing/route-table";
import { httpDelete, httpGet, httpPost, httpPut } from "../../src/handlers/definition";

const ok = (): string => "ok";

function usersTable() {
  return compose(
    new RouterNode("/users").route(
      httpGet("/{id}", ok),
      httpGet("/me", ok),
      httpPut("/{id}", ok),
      httpDelete("/{id}", ok),
      httpPost("/", ok),
    ),
  );
}

describe("RouteTable", () => {
  describe("match", () => {
    it("extracts decoded path parameters", () => {
      const match = usersTable().match("GET", "/users/a%20b");

      expect(match).toMatchObject({ kind: "found", params: { id: "a b" } });
    });

    it("prefers a literal segment over a parameter", () => {
      const match = usersTable().match("GET", "/users/me");

      expect(match.kind).toBe("found");
      expect(match.kind === "found" && match.route.path).toBe("/users/me");
      expect(match.kind === "found" && match.params).toEqual({});
    });

    it("reports the allowed methods when only the method differs", () => {
      const match = usersTable().match("PATCH", "/users/42");

      expect(match).toEqual({ kind: "method-not-allowed", allow: ["GET", "PUT", "DELETE"] });
    });

    it("reports not-found when no template matches", () => {
      expect(usersTable().match("GET", "/users/42/posts")).toEqual({ kind: "not-found" });
      expect(usersTable().match("GET", "/")).toEqual({ kind: "not-found" });
    });

    it("ignores trailing slashes", () => {
      expect(usersTable().match("POST", "/users/").kind).toBe("found");
    });

    it("does not match a malformed percent-escape", () => {
      expect(usersTable().match("GET", "/users/%E0%A4%A")).toEqual({ kind: "not-found" });
    });
  });

  it("finds a route by method and exact template", () => {
    const table = usersTable();

    expect(table.find("PUT", "/users/{id}")?.method).toBe("PUT");
    expect(table.find("PATCH", "/users/{id}")).toBeUndefined();
  });

  it("lists each route's dependencies with its label", () => {
    // Arrange
    const Database = defineService("Database");
    const root = new RouterNode("/").route(httpGet("/users/{id}", { inject: [Database] }, ok));

    // Act
    const [requirement] = compose(root).requirements();

    // Assert
    expect(requirement.consumer).toBe("GET /users/{id}");
    expect(requirement.dependencies).toEqual([Database]);
    expect(requirement.scope.owner).toBe("router /");
  });

  it("formats route labels as method and path", () => {
    expect(routeLabel({ method: "DELETE", path: "/users/{id}" })).toBe("DELETE /users/{id}");
  });
});
