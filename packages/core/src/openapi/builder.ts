import createDebug from "debug";
import type { Constraint, HttpMethod, ObjectNode, SchemaNode, SecuritySchemeDefinition } from "@plinth/types";
import { pathParamNames } from "@plinth/common";
import { BuildError } from "../errors/build-errors";
import type { SchemaRegistry } from "../schema/registry";
import type { ObjectShape } from "../schema/shapes";
import type { ComposedRoute, RouteTable } from "../routing/route-table";
import type {
  ApiDocument,
  InfoObject,
  JsonSchema,
  OperationObject,
  ParameterObject,
  ResponseObject,
  ServerObject,
  TagObject,
} from "./types";

const debug = createDebug("plinth:core:openapi");

const RESERVED_COMPONENTS = ["ApiError", "FieldError"];

const STATUS_DESCRIPTIONS: Record<number, string> = {
  101: "Switching Protocols",
  200: "OK",
  201: "Created",
  202: "Accepted",
  204: "No Content",
  400: "Bad Request",
  401: "Unauthorized",
  422: "Validation Failed",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

export type ApiDocumentOptions = {
  info: InfoObject;
  servers?: ServerObject[];
  /** Declared schemes. Only those a documented route references are emitted. */
  securitySchemes?: Readonly<Record<string, SecuritySchemeDefinition>>;
  /** Descriptions for tags. Only tags a documented route uses are emitted. */
  tags?: TagObject[];
};

function componentRef(name: string): JsonSchema {
  return { $ref: `#/components/schemas/${name}` };
}

function constraintKeywords(constraints: readonly Constraint[]): JsonSchema {
  const schema: JsonSchema = {};
  for (const constraint of constraints) {
    switch (constraint.kind) {
      case "minLength":
        schema.minLength = constraint.value;
        break;
      case "maxLength":
        schema.maxLength = constraint.value;
        break;
      case "pattern":
        schema.pattern = constraint.value;
        break;
      case "email":
        schema.format = "email";
        break;
      case "minimum":
        schema.minimum = constraint.value;
        break;
      case "maximum":
        schema.maximum = constraint.value;
        break;
      case "required":
        break;
    }
  }
  return schema;
}

/** Projects a SchemaNode onto JSON Schema 2020-12, as used by OpenAPI 3.1. */
export function toJsonSchema(node: SchemaNode): JsonSchema {
  switch (node.type) {
    case "reference":
      return componentRef(node.target);
    case "scalar":
      return { type: node.kind, ...constraintKeywords(node.constraints) };
    case "array":
      return { type: "array", items: toJsonSchema(node.items) };
    case "map":
      return { type: "object", additionalProperties: toJsonSchema(node.values) };
    case "nullable":
      return { anyOf: [toJsonSchema(node.inner), { type: "null" }] };
    case "object": {
      const properties: Record<string, JsonSchema> = {};
      for (const [name, child] of Object.entries(node.properties)) {
        properties[name] = toJsonSchema(child);
      }
      return {
        type: "object",
        properties,
        ...(node.required.length > 0 ? { required: [...node.required] } : {}),
      };
    }
  }
}

function collectReferences(node: SchemaNode, into: Set<string>): void {
  switch (node.type) {
    case "reference":
      into.add(node.target);
      return;
    case "array":
      collectReferences(node.items, into);
      return;
    case "map":
      collectReferences(node.values, into);
      return;
    case "nullable":
      collectReferences(node.inner, into);
      return;
    case "object":
      for (const child of Object.values(node.properties)) collectReferences(child, into);
      return;
    case "scalar":
      return;
  }
}

function builtInComponents(): Record<string, JsonSchema> {
  return {
    ApiError: {
      type: "object",
      properties: { message: { type: "string" }, details: {} },
      required: ["message"],
    },
    FieldError: {
      type: "object",
      properties: {
        path: { type: "string" },
        constraint: { type: "string" },
        message: { type: "string" },
      },
      required: ["path", "constraint", "message"],
    },
  };
}

function errorResponse(status: number): ResponseObject {
  return {
    description: STATUS_DESCRIPTIONS[status] ?? "Error",
    content: { "application/json": { schema: componentRef("ApiError") } },
  };
}

function validationErrorResponse(): ResponseObject {
  return {
    description: STATUS_DESCRIPTIONS[422],
    content: {
      "application/json": {
        schema: {
          type: "object",
          properties: {
            message: { type: "string" },
            details: { type: "array", items: componentRef("FieldError") },
          },
          required: ["message", "details"],
        },
      },
    },
  };
}

/** `GET /users/{id}` → `getUsersById`. */
export function deriveOperationId(method: HttpMethod, path: string): string {
  const words = path
    .split("/")
    .filter(Boolean)
    .map((segment) => {
      const param = /^\{(.+)\}$/.exec(segment);
      const word = (param ? param[1] : segment).replace(/[^A-Za-z0-9]+(.)?/g, (_match, next?: string) =>
        next ? next.toUpperCase() : "",
      );
      const capitalised = word.charAt(0).toUpperCase() + word.slice(1);
      return param ? `By${capitalised}` : capitalised;
    });
  return method.toLowerCase() + words.join("");
}

/**
 * Builds one OpenAPI 3.1 document from the composed routes. Request and
 * response models are referenced from a single components section holding
 * every model the documented routes reach.
 */
export class OpenApiBuilder {
  constructor(
    private readonly table: RouteTable,
    private readonly registry: SchemaRegistry,
  ) {}

  build(options: ApiDocumentOptions): ApiDocument {
    const paths: ApiDocument["paths"] = {};
    const referenced = new Set<string>();
    const usedSchemes: string[] = [];
    const usedTags: string[] = [];

    for (const route of this.table) {
      if (!route.includeInDocs) continue;

      const operation = this.operation(route, referenced);
      for (const scheme of route.security) {
        if (!usedSchemes.includes(scheme)) usedSchemes.push(scheme);
      }
      for (const tag of route.tags) {
        if (!usedTags.includes(tag)) usedTags.push(tag);
      }

      const item = (paths[route.path] ??= {});
      item[methodKey(route.method)] = operation;
    }

    const document: ApiDocument = {
      openapi: "3.1.0",
      info: { ...options.info },
      ...(options.servers ? { servers: options.servers.map((server) => ({ ...server })) } : {}),
      paths,
      components: { schemas: this.components(referenced) },
    };

    const declared = options.securitySchemes ?? {};
    const schemes: Record<string, SecuritySchemeDefinition> = {};
    for (const name of usedSchemes) {
      const scheme = declared[name];
      if (scheme) schemes[name] = schemeDefinition(scheme);
    }
    if (usedSchemes.length > 0) document.components.securitySchemes = schemes;

    if (usedTags.length > 0) {
      document.tags = usedTags.map((name) => {
        const described = options.tags?.find((tag) => tag.name === name);
        return described?.description ? { name, description: described.description } : { name };
      });
    }

    debug("build: %d paths, %d components", Object.keys(paths).length, Object.keys(document.components.schemas).length);
    return document;
  }

  private schema(node: SchemaNode, referenced: Set<string>): JsonSchema {
    collectReferences(node, referenced);
    return toJsonSchema(node);
  }

  private operation(route: ComposedRoute, referenced: Set<string>): OperationObject {
    const parameters = this.parameters(route, referenced);
    const operation: OperationObject = {
      operationId: route.operationId ?? deriveOperationId(route.method, route.path),
      ...(route.summary ? { summary: route.summary } : {}),
      ...(route.description ? { description: route.description } : {}),
      ...(route.tags.length > 0 ? { tags: [...route.tags] } : {}),
      ...(route.deprecated ? { deprecated: true } : {}),
      ...(parameters.length > 0 ? { parameters } : {}),
      responses: {},
    };

    if (route.body && route.kind === "http") {
      operation.requestBody = {
        required: true,
        content: { "application/json": { schema: this.schema(this.registry.nodeFor(route.body), referenced) } },
      };
    }

    const success: ResponseObject = { description: STATUS_DESCRIPTIONS[route.status] ?? "Success" };
    if (route.response && route.kind === "http") {
      success.content = {
        "application/json": { schema: this.schema(this.registry.nodeFor(route.response), referenced) },
      };
    }
    operation.responses[String(route.status)] = success;
    operation.responses["400"] = errorResponse(400);
    if (route.security.length > 0) operation.responses["401"] = errorResponse(401);
    if (route.body || route.params || route.query || route.headers) {
      operation.responses["422"] = validationErrorResponse();
    }
    operation.responses["500"] = errorResponse(500);
    if (route.dependencies.length > 0) operation.responses["503"] = errorResponse(503);

    if (route.security.length > 0) {
      operation.security = route.security.map((scheme) => ({ [scheme]: [] }));
    }
    return operation;
  }

  private parameters(route: ComposedRoute, referenced: Set<string>): ParameterObject[] {
    const parameters: ParameterObject[] = [];

    if (route.params) {
      const node = this.objectNode(route.params);
      for (const [name, child] of Object.entries(node.properties)) {
        parameters.push({ name, in: "path", required: true, schema: this.schema(child, referenced) });
      }
    } else {
      for (const name of pathParamNames(route.segments)) {
        parameters.push({ name, in: "path", required: true, schema: { type: "string" } });
      }
    }

    for (const [location, shape] of [
      ["query", route.query],
      ["header", route.headers],
    ] as const) {
      if (!shape) continue;
      const node = this.objectNode(shape);
      for (const [name, child] of Object.entries(node.properties)) {
        parameters.push({
          name,
          in: location,
          required: node.required.includes(name),
          schema: this.schema(child, referenced),
        });
      }
    }
    return parameters;
  }

  private objectNode(shape: ObjectShape): ObjectNode {
    const node = this.registry.nodeFor(shape);
    if (node.type !== "object") {
      throw new BuildError("Parameter shapes must be objects");
    }
    return node;
  }

  private components(referenced: Set<string>): Record<string, JsonSchema> {
    // Follow references between models until no new ones appear.
    const pending = [...referenced];
    while (pending.length > 0) {
      const id = pending.pop();
      if (id === undefined) break;
      const nested = new Set<string>();
      collectReferences(this.registry.resolve(id), nested);
      for (const target of nested) {
        if (!referenced.has(target)) {
          referenced.add(target);
          pending.push(target);
        }
      }
    }

    const schemas: Record<string, JsonSchema> = {};
    for (const [id, node] of this.registry.entries()) {
      if (!referenced.has(id)) continue;
      if (RESERVED_COMPONENTS.includes(id)) {
        throw new BuildError(`Model name "${id}" is reserved for error responses`);
      }
      schemas[id] = toJsonSchema(node);
    }
    return { ...schemas, ...builtInComponents() };
  }
}

function methodKey(method: HttpMethod): keyof ApiDocument["paths"][string] {
  switch (method) {
    case "GET":
      return "get";
    case "POST":
      return "post";
    case "PUT":
      return "put";
    case "PATCH":
      return "patch";
    case "DELETE":
      return "delete";
    case "HEAD":
      return "head";
    case "OPTIONS":
      return "options";
  }
}

function schemeDefinition(scheme: SecuritySchemeDefinition): SecuritySchemeDefinition {
  if (scheme.type === "apiKey") {
    return {
      type: "apiKey",
      in: scheme.in,
      name: scheme.name,
      ...(scheme.description ? { description: scheme.description } : {}),
    };
  }
  return {
    type: "http",
    scheme: scheme.scheme,
    ...(scheme.bearerFormat ? { bearerFormat: scheme.bearerFormat } : {}),
    ...(scheme.description ? { description: scheme.description } : {}),
  };
}

/** Shorthand for `new OpenApiBuilder(table, registry).build(options)`. */
export function buildApiDocument(
  table: RouteTable,
  registry: SchemaRegistry,
  options: ApiDocumentOptions,
): ApiDocument {
  return new OpenApiBuilder(table, registry).build(options);
}
