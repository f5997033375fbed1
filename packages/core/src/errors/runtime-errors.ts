import { InternalServerErrorException, ServiceUnavailableException } from "./http-exception";

/** A schema lookup missed at request time: every type is registered while building. */
export class UnknownTypeError extends InternalServerErrorException {
  constructor(public readonly typeId: string) {
    super(`Unknown type "${typeId}"`);
  }
}

/** A provider failed while resolving a request's dependencies. The handler is not invoked. */
export class DependencyUnavailableError extends ServiceUnavailableException {
  constructor(
    public readonly dependency: string,
    cause: unknown,
  ) {
    super("Service Unavailable", { dependency });
    this.cause = cause;
  }
}

/** The client went away; no response is written for the request. */
export class RequestCancelledError extends Error {
  constructor(public readonly reason?: unknown) {
    super("Request cancelled");
    this.name = "RequestCancelledError";
  }
}

/** A resolver was asked for a descriptor with no binding visible from its scope. */
export class MissingBindingError extends InternalServerErrorException {
  constructor(public readonly dependency: string) {
    super(`No binding for ${dependency} in scope`);
  }
}
