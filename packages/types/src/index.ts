export type {
  Type,
  TypeDescriptor,
  TypeDescriptorKind,
  ResolvedDescriptors,
  Closeable,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
  ProviderScope,
  NextFunction,
} from "./common";

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HandlerMetadata,
  HandlerContext,
} from "./http";

export type { DependencyResolver } from "./container";

export type { HandlerResponse, PlinthLayer } from "./layer";

export type {
  ScalarKind,
  Constraint,
  ConstraintKind,
  ObjectNode,
  ArrayNode,
  ScalarNode,
  ReferenceNode,
  NullableNode,
  MapNode,
  SchemaNode,
} from "./schema";

export type {
  Schema,
  FieldError,
  FieldErrorKind,
  ValidationResult,
} from "./validation";

export type {
  HttpSecurityScheme,
  ApiKeySecurityScheme,
  SecuritySchemeDefinition,
} from "./security";

export type { LogLevel, PlinthLogger, PlinthTracer, PlinthSpan } from "./telemetry";
