import type { SecuritySchemeDefinition } from "@plinth/types";

export type JsonSchema = {
  $ref?: string;
  type?: "object" | "array" | "string" | "integer" | "number" | "boolean" | "null";
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  additionalProperties?: JsonSchema | boolean;
  anyOf?: JsonSchema[];
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;
  minimum?: number;
  maximum?: number;
  description?: string;
};

export type InfoObject = {
  title: string;
  version: string;
  description?: string;
};

export type ServerObject = {
  url: string;
  description?: string;
};

export type TagObject = {
  name: string;
  description?: string;
};

export type ParameterObject = {
  name: string;
  in: "path" | "query" | "header";
  required: boolean;
  schema: JsonSchema;
};

export type MediaTypeObject = {
  schema: JsonSchema;
};

export type RequestBodyObject = {
  required: boolean;
  content: Record<string, MediaTypeObject>;
};

export type ResponseObject = {
  description: string;
  content?: Record<string, MediaTypeObject>;
};

/** Each entry is one alternative; any of them satisfies the operation. */
export type SecurityRequirementObject = Record<string, string[]>;

export type OperationObject = {
  operationId: string;
  summary?: string;
  description?: string;
  tags?: string[];
  deprecated?: boolean;
  parameters?: ParameterObject[];
  requestBody?: RequestBodyObject;
  responses: Record<string, ResponseObject>;
  security?: SecurityRequirementObject[];
};

export type PathItemObject = Partial<
  Record<"get" | "post" | "put" | "patch" | "delete" | "head" | "options", OperationObject>
>;

export type ApiDocument = {
  openapi: "3.1.0";
  info: InfoObject;
  servers?: ServerObject[];
  paths: Record<string, PathItemObject>;
  components: {
    schemas: Record<string, JsonSchema>;
    securitySchemes?: Record<string, SecuritySchemeDefinition>;
  };
  tags?: TagObject[];
};
