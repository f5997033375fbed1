export type ScalarKind = "string" | "integer" | "number" | "boolean";

export type Constraint =
  | { kind: "required" }
  | { kind: "minLength"; value: number }
  | { kind: "maxLength"; value: number }
  | { kind: "pattern"; value: string }
  | { kind: "email" }
  | { kind: "minimum"; value: number }
  | { kind: "maximum"; value: number };

export type ConstraintKind = Constraint["kind"];

export type ObjectNode = {
  type: "object";
  properties: Record<string, SchemaNode>;
  required: string[];
};

export type ArrayNode = {
  type: "array";
  items: SchemaNode;
};

export type ScalarNode = {
  type: "scalar";
  kind: ScalarKind;
  constraints: Constraint[];
};

/** Indirection to a registered model, resolved lazily through the registry. */
export type ReferenceNode = {
  type: "reference";
  target: string;
};

export type NullableNode = {
  type: "nullable";
  inner: SchemaNode;
};

/** String-keyed map with homogeneous values. */
export type MapNode = {
  type: "map";
  values: SchemaNode;
};

export type SchemaNode = ObjectNode | ArrayNode | ScalarNode | ReferenceNode | NullableNode | MapNode;
