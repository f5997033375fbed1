import type { Constraint, TypeDescriptor } from "@plinth/types";
import { BuildError } from "../errors/build-errors";

const MODEL_NAME = /^[A-Za-z0-9._-]+$/;

export interface StringShape {
  readonly shape: "scalar";
  readonly kind: "string";
  readonly constraints: readonly Constraint[];
}

export interface IntegerShape {
  readonly shape: "scalar";
  readonly kind: "integer";
  readonly constraints: readonly Constraint[];
}

export interface NumberShape {
  readonly shape: "scalar";
  readonly kind: "number";
  readonly constraints: readonly Constraint[];
}

export interface BooleanShape {
  readonly shape: "scalar";
  readonly kind: "boolean";
  readonly constraints: readonly Constraint[];
}

export interface ArrayShape<E extends Shape = Shape> {
  readonly shape: "array";
  readonly items: E;
}

export interface MapShape<V extends Shape = Shape> {
  readonly shape: "map";
  readonly values: V;
}

export interface NullableShape<I extends Shape = Shape> {
  readonly shape: "nullable";
  readonly inner: I;
}

/** Marks an object property as not required. Only meaningful inside `object()`. */
export interface OptionalShape<I extends Shape = Shape> {
  readonly shape: "optional";
  readonly inner: I;
}

export interface ObjectShape<P extends Record<string, Shape> = Record<string, Shape>> {
  readonly shape: "object";
  readonly properties: P;
}

export interface RefShape<T = unknown> {
  readonly shape: "ref";
  readonly model: ModelDescriptor<T>;
}

export type ScalarShape = StringShape | IntegerShape | NumberShape | BooleanShape;

export type Shape =
  | ScalarShape
  | ArrayShape
  | MapShape
  | NullableShape
  | OptionalShape
  | ObjectShape
  | RefShape;

/** A named model: a TypeDescriptor that also knows how to build its shape. */
export interface ModelDescriptor<T = unknown> extends TypeDescriptor<T> {
  readonly kind: "model";
  readonly shape: () => ObjectShape;
}

type RequiredKeys<P extends Record<string, Shape>> = {
  [K in keyof P]: P[K] extends OptionalShape ? never : K;
}[keyof P];

type OptionalKeys<P extends Record<string, Shape>> = {
  [K in keyof P]: P[K] extends OptionalShape ? K : never;
}[keyof P];

type InferObject<P extends Record<string, Shape>> = {
  [K in RequiredKeys<P>]: Infer<P[K]>;
} & {
  [K in OptionalKeys<P>]?: Infer<P[K]>;
};

/** The TypeScript type a value validated against `S` has. */
export type Infer<S> = S extends StringShape
  ? string
  : S extends IntegerShape | NumberShape
    ? number
    : S extends BooleanShape
      ? boolean
      : S extends ArrayShape<infer E>
        ? Infer<E>[]
        : S extends MapShape<infer V>
          ? Record<string, Infer<V>>
          : S extends NullableShape<infer I>
            ? Infer<I> | null
            : S extends OptionalShape<infer I>
              ? Infer<I> | undefined
              : S extends ObjectShape<infer P>
                ? InferObject<P>
                : S extends RefShape<infer T>
                  ? T
                  : never;

export type StringOptions = {
  minLength?: number;
  maxLength?: number;
  pattern?: string | RegExp;
  email?: boolean;
};

export type NumericOptions = {
  minimum?: number;
  maximum?: number;
};

export function string(options: StringOptions = {}): StringShape {
  const constraints: Constraint[] = [];
  if (options.minLength !== undefined) constraints.push({ kind: "minLength", value: options.minLength });
  if (options.maxLength !== undefined) constraints.push({ kind: "maxLength", value: options.maxLength });
  if (options.pattern !== undefined) {
    constraints.push({ kind: "pattern", value: patternSource(options.pattern) });
  }
  if (options.email) constraints.push({ kind: "email" });
  return { shape: "scalar", kind: "string", constraints };
}

/** A pattern is documented as a bare source string, so it can carry no flags. */
function patternSource(pattern: string | RegExp): string {
  if (typeof pattern !== "string") {
    if (pattern.flags) {
      throw new BuildError(
        `Pattern /${pattern.source}/${pattern.flags} has flags; string patterns cannot carry flags`,
      );
    }
    return patternSource(pattern.source);
  }
  try {
    new RegExp(pattern);
  } catch (error) {
    throw new BuildError(`Invalid string pattern "${pattern}"`, { cause: error });
  }
  return pattern;
}

function numericConstraints(options: NumericOptions): Constraint[] {
  const constraints: Constraint[] = [];
  if (options.minimum !== undefined) constraints.push({ kind: "minimum", value: options.minimum });
  if (options.maximum !== undefined) constraints.push({ kind: "maximum", value: options.maximum });
  return constraints;
}

export function integer(options: NumericOptions = {}): IntegerShape {
  return { shape: "scalar", kind: "integer", constraints: numericConstraints(options) };
}

export function number(options: NumericOptions = {}): NumberShape {
  return { shape: "scalar", kind: "number", constraints: numericConstraints(options) };
}

export function boolean(): BooleanShape {
  return { shape: "scalar", kind: "boolean", constraints: [] };
}

export function array<E extends Shape>(items: E): ArrayShape<E> {
  return { shape: "array", items };
}

export function map<V extends Shape>(values: V): MapShape<V> {
  return { shape: "map", values };
}

export function nullable<I extends Shape>(inner: I): NullableShape<I> {
  return { shape: "nullable", inner };
}

export function optional<I extends Shape>(inner: I): OptionalShape<I> {
  return { shape: "optional", inner };
}

export function object<P extends Record<string, Shape>>(properties: P): ObjectShape<P> {
  return { shape: "object", properties };
}

export function ref<T>(model: ModelDescriptor<T>): RefShape<T> {
  return { shape: "ref", model };
}

/**
 * Declares a named model. The shape function is called lazily by the
 * SchemaRegistry, so a model may reference itself or models declared later.
 *
 * @example
 * type TreeNode = { value: string; children: TreeNode[] };
 * // Annotate models that refer to themselves.
 * const TreeNode: ModelDescriptor<TreeNode> = defineModel("TreeNode", () =>
 *   object({ value: string(), children: array(ref(TreeNode)) }),
 * );
 */
export function defineModel<T>(name: string, shape: () => ObjectShape): ModelDescriptor<T> {
  if (!MODEL_NAME.test(name)) {
    throw new BuildError(
      `Invalid model name "${name}": use letters, digits, ".", "_" or "-" only`,
    );
  }
  const descriptor: ModelDescriptor<T> = { id: name, kind: "model", shape };
  return Object.freeze(descriptor);
}
