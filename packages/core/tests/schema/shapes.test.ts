import { describe, it, expect } from "vitest";
import {
  array,
  defineModel,
  integer,
  number,
  object,
  optional,
  ref,
  string,
  type Infer,
} from "../../src/schema/shapes";
import { BuildError } from "../../src/errors/build-errors";

describe("shape builders", () => {
  it("collects string options into constraints in a fixed order", () => {
    // Act
    const shape = string({ email: true, maxLength: 80, minLength: 3, pattern: /^[a-z]+$/ });

    // Assert
    expect(shape).toEqual({
      shape: "scalar",
      kind: "string",
      constraints: [
        { kind: "minLength", value: 3 },
        { kind: "maxLength", value: 80 },
        { kind: "pattern", value: "^[a-z]+$" },
        { kind: "email" },
      ],
    });
  });

  it("rejects a RegExp pattern that carries flags", () => {
    expect(() => string({ pattern: /^[a-z]+$/i })).toThrow(
      new BuildError("Pattern /^[a-z]+$/i has flags; string patterns cannot carry flags"),
    );
  });

  it("rejects a pattern that does not compile", () => {
    // Act
    const error = (() => {
      try {
        string({ pattern: "(" });
        return null;
      } catch (e) {
        return e;
      }
    })();

    // Assert
    expect(error).toBeInstanceOf(BuildError);
    expect(error).toMatchObject({ message: 'Invalid string pattern "("' });
    expect(error).toHaveProperty("cause", expect.any(SyntaxError));
  });

  it("builds numeric bounds for integers and numbers", () => {
    expect(integer({ minimum: 1 }).constraints).toEqual([{ kind: "minimum", value: 1 }]);
    expect(number({ maximum: 2.5 }).constraints).toEqual([{ kind: "maximum", value: 2.5 }]);
    expect(integer().constraints).toEqual([]);
  });

  it("infers optional properties from optional() fields", () => {
    // Arrange
    const shape = object({ name: string(), nickname: optional(string()), scores: array(integer()) });
    type Person = Infer<typeof shape>;

    // Act
    const value: Person = { name: "Ada", scores: [1, 2] };

    // Assert
    expect(value.nickname).toBeUndefined();
  });
});

describe("defineModel", () => {
  it("creates a frozen model descriptor keyed by name", () => {
    // Act
    const User = defineModel<{ id: string }>("User", () => object({ id: string() }));

    // Assert
    expect(User.id).toBe("User");
    expect(User.kind).toBe("model");
    expect(Object.isFrozen(User)).toBe(true);
  });

  it("accepts dotted and dashed names", () => {
    expect(defineModel("billing.Invoice-v2", () => object({})).id).toBe("billing.Invoice-v2");
  });

  it("rejects names that cannot be component names", () => {
    expect(() => defineModel("User Profile", () => object({}))).toThrow(BuildError);
    expect(() => defineModel("", () => object({}))).toThrow('Invalid model name ""');
  });

  it("lets a ref shape carry the model's type", () => {
    // Arrange
    type Tag = { label: string };
    const Tag = defineModel<Tag>("Tag", () => object({ label: string() }));
    const shape = object({ tags: array(ref(Tag)) });

    // Act
    const value: Infer<typeof shape> = { tags: [{ label: "x" }] };

    // Assert
    expect(value.tags[0].label).toBe("x");
  });
});
