import type {
  FieldError,
  HandlerContext,
  HandlerResponse,
  NextFunction,
  PlinthLayer,
  SchemaNode,
} from "@plinth/types";
import { UnprocessableEntityException } from "../errors/http-exception";
import { decodeBody } from "../handlers/body";
import {
  VALIDATED_BODY,
  VALIDATED_HEADERS,
  VALIDATED_PARAMS,
  VALIDATED_QUERY,
  type ValidatedShapes,
} from "../handlers/context";
import type { SchemaLookup, SchemaRegistry } from "../schema/registry";
import { validate } from "../validation/validate";

/** SchemaNodes for each validated part of a request, built once per route. */
export type CompiledValidation = {
  params?: SchemaNode;
  query?: SchemaNode;
  headers?: SchemaNode;
  body?: SchemaNode;
};

export function compileValidation(shapes: ValidatedShapes, registry: SchemaRegistry): CompiledValidation {
  return {
    params: shapes.params && registry.nodeFor(shapes.params),
    query: shapes.query && registry.nodeFor(shapes.query),
    headers: shapes.headers && registry.nodeFor(shapes.headers),
    body: shapes.body && registry.nodeFor(shapes.body),
  };
}

export function hasValidation(compiled: CompiledValidation): boolean {
  return Boolean(compiled.params ?? compiled.query ?? compiled.headers ?? compiled.body);
}

/**
 * Validates every declared part of the request and stores the results in the
 * handler metadata. Path, query and header values are text and are coerced
 * to their declared kinds. All failures are reported together as a 422.
 */
export class ValidationLayer implements PlinthLayer {
  constructor(
    private readonly compiled: CompiledValidation,
    private readonly schemas: SchemaLookup,
  ) {}

  async handle(context: HandlerContext, next: NextFunction<HandlerResponse>): Promise<HandlerResponse> {
    const { request, metadata } = context;
    const errors: FieldError[] = [];

    const run = (key: string, node: SchemaNode | undefined, raw: unknown, section: string, coerce: boolean): void => {
      if (!node) return;
      const result = validate(raw, node, this.schemas, { coerce, path: section });
      if (result.success) {
        metadata.set(key, result.data);
      } else {
        errors.push(...result.errors);
      }
    };

    run(VALIDATED_PARAMS, this.compiled.params, request.pathParams, "params", true);
    run(VALIDATED_QUERY, this.compiled.query, request.query, "query", true);
    run(VALIDATED_HEADERS, this.compiled.headers, request.headers, "headers", true);
    if (this.compiled.body) {
      run(VALIDATED_BODY, this.compiled.body, decodeBody(request), "body", false);
    }

    if (errors.length > 0) {
      throw new UnprocessableEntityException("Validation failed", errors);
    }
    return next();
  }
}
