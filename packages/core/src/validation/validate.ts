import type { Constraint, FieldError, ScalarKind, ScalarNode, SchemaNode, ValidationResult } from "@plinth/types";
import type { SchemaLookup } from "../schema/registry";

export type ValidateOptions = {
  /**
   * Convert textual input (path, query and header values) to the declared
   * scalar kinds before checking constraints, and wrap single values
   * declared as arrays.
   */
  coerce?: boolean;
  /** Prefix for reported field paths, e.g. `body` or `query`. */
  path?: string;
};

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const INTEGER_TEXT = /^[+-]?\d+$/;

const EXPECTED: Record<ScalarKind, string> = {
  string: "a string",
  integer: "an integer",
  number: "a number",
  boolean: "a boolean",
};

const patternCache = new Map<string, RegExp>();

type Outcome = { ok: true; value: unknown } | { ok: false };

/**
 * Checks `raw` against `node`, visiting every field and every constraint.
 * Unknown object fields are dropped from the returned value.
 */
export function validate(
  raw: unknown,
  node: SchemaNode,
  schemas: SchemaLookup,
  options: ValidateOptions = {},
): ValidationResult<unknown> {
  const errors: FieldError[] = [];
  const outcome = check(raw, node, options.path ?? "", {
    schemas,
    coerce: options.coerce ?? false,
    errors,
  });
  if (errors.length > 0 || !outcome.ok) return { success: false, errors };
  return { success: true, data: outcome.value };
}

type Walk = {
  schemas: SchemaLookup;
  coerce: boolean;
  errors: FieldError[];
};

function check(raw: unknown, node: SchemaNode, path: string, walk: Walk): Outcome {
  switch (node.type) {
    case "reference":
      return check(raw, walk.schemas.resolve(node.target), path, walk);
    case "nullable":
      if (raw === null) return { ok: true, value: null };
      return check(raw, node.inner, path, walk);
    case "object":
      return checkObject(raw, node.properties, node.required, path, walk);
    case "map":
      return checkMap(raw, node.values, path, walk);
    case "array":
      return checkArray(raw, node.items, path, walk);
    case "scalar":
      return checkScalar(raw, node, path, walk);
  }
}

function checkObject(
  raw: unknown,
  properties: Record<string, SchemaNode>,
  required: readonly string[],
  path: string,
  walk: Walk,
): Outcome {
  if (!isPlainObject(raw)) {
    return fail(walk, path, "type", "expected an object");
  }

  const value: Record<string, unknown> = {};
  let ok = true;
  for (const [name, child] of Object.entries(properties)) {
    const fieldPath = joinPath(path, name);
    const fieldValue = Object.hasOwn(raw, name) ? raw[name] : undefined;
    if (fieldValue === undefined) {
      if (required.includes(name)) {
        walk.errors.push({ path: fieldPath, constraint: "required", message: "Required field is missing" });
        ok = false;
      }
      continue;
    }
    const outcome = check(fieldValue, child, fieldPath, walk);
    if (outcome.ok) value[name] = outcome.value;
    else ok = false;
  }
  return ok ? { ok: true, value } : { ok: false };
}

function checkMap(raw: unknown, values: SchemaNode, path: string, walk: Walk): Outcome {
  if (!isPlainObject(raw)) {
    return fail(walk, path, "type", "expected an object");
  }
  const value: Record<string, unknown> = {};
  let ok = true;
  for (const [key, entry] of Object.entries(raw)) {
    const outcome = check(entry, values, joinPath(path, key), walk);
    if (outcome.ok) value[key] = outcome.value;
    else ok = false;
  }
  return ok ? { ok: true, value } : { ok: false };
}

function checkArray(raw: unknown, items: SchemaNode, path: string, walk: Walk): Outcome {
  const input = walk.coerce && !Array.isArray(raw) ? [raw] : raw;
  if (!Array.isArray(input)) {
    return fail(walk, path, "type", "expected an array");
  }
  const value: unknown[] = [];
  let ok = true;
  input.forEach((element: unknown, index) => {
    const outcome = check(element, items, `${path}[${index}]`, walk);
    if (outcome.ok) value.push(outcome.value);
    else ok = false;
  });
  return ok ? { ok: true, value } : { ok: false };
}

function checkScalar(raw: unknown, node: ScalarNode, path: string, walk: Walk): Outcome {
  const converted = walk.coerce && typeof raw === "string" ? coerceText(raw, node.kind) : raw;
  if (converted === COERCION_FAILED) {
    return fail(walk, path, "type", `cannot convert "${String(raw)}" to ${EXPECTED[node.kind]}`);
  }
  if (!hasKind(converted, node.kind)) {
    return fail(walk, path, "type", `expected ${EXPECTED[node.kind]}`);
  }

  let ok = true;
  for (const constraint of node.constraints) {
    const message = violation(constraint, converted);
    if (message) {
      walk.errors.push({ path, constraint: constraint.kind, message });
      ok = false;
    }
  }
  return ok ? { ok: true, value: converted } : { ok: false };
}

const COERCION_FAILED = Symbol("coercion-failed");

function coerceText(raw: string, kind: ScalarKind): unknown {
  switch (kind) {
    case "string":
      return raw;
    case "integer":
      return INTEGER_TEXT.test(raw.trim()) ? Number(raw) : COERCION_FAILED;
    case "number": {
      const trimmed = raw.trim();
      const parsed = Number(trimmed);
      return trimmed !== "" && Number.isFinite(parsed) ? parsed : COERCION_FAILED;
    }
    case "boolean":
      if (raw === "true") return true;
      if (raw === "false") return false;
      return COERCION_FAILED;
  }
}

function hasKind(value: unknown, kind: ScalarKind): value is string | number | boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

function violation(constraint: Constraint, value: string | number | boolean): string | null {
  switch (constraint.kind) {
    case "required":
      return null;
    case "minLength":
      return typeof value === "string" && [...value].length < constraint.value
        ? `must be at least ${constraint.value} characters`
        : null;
    case "maxLength":
      return typeof value === "string" && [...value].length > constraint.value
        ? `must be at most ${constraint.value} characters`
        : null;
    case "pattern":
      return typeof value === "string" && !compilePattern(constraint.value).test(value)
        ? `must match pattern ${constraint.value}`
        : null;
    case "email":
      return typeof value === "string" && !EMAIL.test(value) ? "must be a valid email address" : null;
    case "minimum":
      return typeof value === "number" && value < constraint.value
        ? `must be greater than or equal to ${constraint.value}`
        : null;
    case "maximum":
      return typeof value === "number" && value > constraint.value
        ? `must be less than or equal to ${constraint.value}`
        : null;
  }
}

function compilePattern(source: string): RegExp {
  let compiled = patternCache.get(source);
  if (!compiled) {
    compiled = new RegExp(source);
    patternCache.set(source, compiled);
  }
  return compiled;
}

function fail(walk: Walk, path: string, constraint: FieldError["constraint"], message: string): Outcome {
  walk.errors.push({ path, constraint, message });
  return { ok: false };
}

function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
