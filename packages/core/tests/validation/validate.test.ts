import { describe, it, expect } from "vitest";
import { SchemaRegistry } from "../../src/schema/registry";
import {
  array,
  boolean,
  defineModel,
  integer,
  map,
  nullable,
  number,
  object,
  optional,
  ref,
  string,
} from "../../src/schema/shapes";
import { validate } from "../../src/validation/validate";

const Signup = defineModel("Signup", () =>
  object({
    name: string({ minLength: 1, maxLength: 40 }),
    email: string({ email: true }),
    age: optional(integer({ minimum: 13, maximum: 120 })),
  }),
);

describe("validate", () => {
  it("returns the value with unknown fields removed", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.register(Signup);

    // Act
    const result = validate({ name: "Ada", email: "ada@example.com", admin: true }, node, registry);

    // Assert
    expect(result).toEqual({ success: true, data: { name: "Ada", email: "ada@example.com" } });
  });

  it("reports a missing name and an invalid email together", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.register(Signup);

    // Act
    const result = validate({ email: "not-an-email" }, node, registry, { path: "body" });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [
        { path: "body.name", constraint: "required", message: "Required field is missing" },
        { path: "body.email", constraint: "email", message: "must be a valid email address" },
      ],
    });
  });

  it("treats inherited property names as missing fields", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ constructor: string(), toString: optional(string()) }));

    // Act
    const result = validate({}, node, registry);

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "constructor", constraint: "required", message: "Required field is missing" }],
    });
  });

  it("reports every violated constraint on a single field", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(string({ minLength: 5, pattern: "^[0-9]+$" }));

    // Act
    const result = validate("ab", node, registry, { path: "code" });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [
        { path: "code", constraint: "minLength", message: "must be at least 5 characters" },
        { path: "code", constraint: "pattern", message: "must match pattern ^[0-9]+$" },
      ],
    });
  });

  it("checks numeric bounds", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.register(Signup);

    // Act
    const result = validate({ name: "Ada", email: "ada@example.com", age: 200 }, node, registry);

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "age", constraint: "maximum", message: "must be less than or equal to 120" }],
    });
  });

  it("indexes array element paths", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ items: array(object({ code: string({ maxLength: 3 }) })) }));

    // Act
    const result = validate({ items: [{ code: "abc" }, { code: "abc" }, { code: "abcd" }] }, node, registry, {
      path: "body",
    });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "body.items[2].code", constraint: "maxLength", message: "must be at most 3 characters" }],
    });
  });

  it("reports type mismatches without coercing", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ count: integer(), ratio: number(), on: boolean(), tags: array(string()) }));

    // Act
    const result = validate({ count: "4", ratio: 1.5, on: "true", tags: "a" }, node, registry);

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [
        { path: "count", constraint: "type", message: "expected an integer" },
        { path: "on", constraint: "type", message: "expected a boolean" },
        { path: "tags", constraint: "type", message: "expected an array" },
      ],
    });
  });

  it("coerces textual input before checking constraints", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(
      object({ limit: integer({ maximum: 100 }), verbose: boolean(), ids: array(integer()), score: number() }),
    );

    // Act
    const result = validate({ limit: "42", verbose: "false", ids: "7", score: "2.5" }, node, registry, {
      coerce: true,
    });

    // Assert
    expect(result).toEqual({ success: true, data: { limit: 42, verbose: false, ids: [7], score: 2.5 } });
  });

  it("folds coercion failures into the error list", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ id: integer(), page: integer({ minimum: 1 }) }));

    // Act
    const result = validate({ id: "abc", page: "0" }, node, registry, { coerce: true, path: "query" });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [
        { path: "query.id", constraint: "type", message: 'cannot convert "abc" to an integer' },
        { path: "query.page", constraint: "minimum", message: "must be greater than or equal to 1" },
      ],
    });
  });

  it("accepts null only for nullable fields", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ note: nullable(string()), title: string() }));

    // Act
    const result = validate({ note: null, title: null }, node, registry);

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "title", constraint: "type", message: "expected a string" }],
    });
  });

  it("validates map values under their keys", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(map(integer()));

    // Act
    const result = validate({ apples: 3, pears: "many" }, node, registry, { path: "stock" });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "stock.pears", constraint: "type", message: "expected an integer" }],
    });
  });

  it("follows references into registered models", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.nodeFor(object({ signup: ref(Signup) }));

    // Act
    const result = validate({ signup: { name: "", email: "ada@example.com" } }, node, registry);

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "signup.name", constraint: "minLength", message: "must be at least 1 characters" }],
    });
  });

  it("rejects a non-object where an object is expected", () => {
    // Arrange
    const registry = new SchemaRegistry();
    const node = registry.register(Signup);

    // Act
    const result = validate(undefined, node, registry, { path: "body" });

    // Assert
    expect(result).toEqual({
      success: false,
      errors: [{ path: "body", constraint: "type", message: "expected an object" }],
    });
  });
});
