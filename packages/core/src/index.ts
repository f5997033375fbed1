// Schemas
export {
  string,
  integer,
  number,
  boolean,
  array,
  map,
  nullable,
  optional,
  object,
  ref,
  defineModel,
} from "./schema/shapes";
export type {
  Shape,
  ScalarShape,
  StringShape,
  IntegerShape,
  NumberShape,
  BooleanShape,
  ArrayShape,
  MapShape,
  NullableShape,
  OptionalShape,
  ObjectShape,
  RefShape,
  ModelDescriptor,
  Infer,
  StringOptions,
  NumericOptions,
} from "./schema/shapes";
export { SchemaRegistry, canonicalJson } from "./schema/registry";
export type { SchemaLookup } from "./schema/registry";

// Validation
export { validate } from "./validation/validate";
export type { ValidateOptions } from "./validation/validate";

// Routes
export {
  createRoute,
  httpGet,
  httpPost,
  httpPut,
  httpPatch,
  httpDelete,
  websocket,
} from "./handlers/definition";
export type {
  RouteDescriptor,
  RouteKind,
  RouteOptions,
  RouteConfig,
  RouteHandler,
  HandlerResult,
  WebSocketHandler,
  WebSocketOptions,
} from "./handlers/definition";
export type { HandlerRequest, RouteContext } from "./handlers/context";

// Routing
export { RouterNode } from "./routing/router-node";
export type { ProviderDeclaration } from "./routing/router-node";
export { compose } from "./routing/compose";
export { RouteTable, routeLabel } from "./routing/route-table";
export type { ComposedRoute, RouteMatch } from "./routing/route-table";

// DI
export { DependencyGraph } from "./di/dependency-graph";
export type { DependencyRequirement, DependencyGraphOptions } from "./di/dependency-graph";
export { BindingScope } from "./di/binding-scope";
export type { DependencyBinding, ScopedBinding } from "./di/binding-scope";
export { RequestScope } from "./di/request-scope";

// Layers
export { runLayerPipeline } from "./layers/pipeline";
export { disposeLayers } from "./layers/dispose";
export { createDefaultSystemLayers } from "./layers/system";
export { ValidationLayer, compileValidation } from "./layers/validate";
export type { CompiledValidation } from "./layers/validate";
export { SecurityLayer, extractCredentials } from "./layers/security";
export type { Credentials, SecuritySchemeOptions } from "./layers/security";

// Metadata
export { HandlerMetadataStore } from "./metadata/handler-metadata";

// Handler pipeline
export {
  executeHandlerPipeline,
  normalizeResponse,
  toErrorResponse,
} from "./handlers/pipeline";
export type { PreparedRoute, PipelineOptions } from "./handlers/pipeline";

// OpenAPI
export { OpenApiBuilder, buildApiDocument, toJsonSchema, deriveOperationId } from "./openapi/builder";
export type { ApiDocumentOptions } from "./openapi/builder";
export type * from "./openapi/types";

// Lifespan
export { LifespanManager, DEFAULT_SHUTDOWN_TIMEOUT_MS } from "./lifespan/lifespan-manager";
export type {
  LifespanState,
  LifespanContext,
  LifespanHook,
  ShutdownHookOptions,
} from "./lifespan/lifespan-manager";

// WebSocket
export { WebSocketSession } from "./websocket/session";
export type { WebSocketChannel } from "./websocket/session";
export type { WebSocketConnection } from "./websocket/connect";

// Application
export { PlinthFactory } from "./application/factory";
export type { CreateOptions } from "./application/factory";
export { PlinthApplication } from "./application/application";
export { resolveSettings, DEFAULT_DOCS_PATH } from "./application/settings";
export type { ApplicationSettings } from "./application/settings";

// Errors
export {
  HttpException,
  BadRequestException,
  UnauthorizedException,
  ForbiddenException,
  NotFoundException,
  MethodNotAllowedException,
  NotAcceptableException,
  ConflictException,
  GoneException,
  PayloadTooLargeException,
  UnprocessableEntityException,
  TooManyRequestsException,
  InternalServerErrorException,
  NotImplementedException,
  BadGatewayException,
  ServiceUnavailableException,
  GatewayTimeoutException,
} from "./errors/http-exception";
export type { ErrorBody } from "./errors/http-exception";
export {
  BuildError,
  SchemaConflictError,
  RouteConflictError,
  RouteDefinitionError,
  UnresolvedDependencyError,
  CyclicDependencyError,
  DependencyScopeError,
  UnknownSecuritySchemeError,
  StartupHookError,
} from "./errors/build-errors";
export type { MissingBinding } from "./errors/build-errors";
export {
  UnknownTypeError,
  DependencyUnavailableError,
  RequestCancelledError,
  MissingBindingError,
} from "./errors/runtime-errors";

// Testing
export { TestingApplication, mockRequest } from "./testing/test-app";
export type { MockRequestOptions } from "./testing/test-app";

// Re-export key types from @plinth/types
export type {
  TypeDescriptor,
  Provider,
  ProviderScope,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HandlerMetadata,
  HandlerContext,
  HandlerResponse,
  PlinthLayer,
  SchemaNode,
  FieldError,
  ValidationResult,
  DependencyResolver,
  SecuritySchemeDefinition,
} from "@plinth/types";
export { defineService } from "@plinth/common";
