import type { ConstraintKind } from "./schema";

export interface Schema<T = unknown> {
  parse(data: unknown): T;
}

/** `type` covers both JSON type mismatches and failed string coercion. */
export type FieldErrorKind = ConstraintKind | "type";

export type FieldError = {
  /** Dotted/indexed location, e.g. `body.items[2].code`. */
  path: string;
  constraint: FieldErrorKind;
  message: string;
};

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] };
