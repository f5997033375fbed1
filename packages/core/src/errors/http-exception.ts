import { STATUS_CODES } from "node:http";

/** JSON body written for every failed request. */
export type ErrorBody = {
  message: string;
  details?: unknown;
};

/**
 * An error that maps onto an HTTP response. Thrown from a handler or layer,
 * it is answered with its status code and `{ message, details }`.
 */
export class HttpException extends Error {
  constructor(
    public readonly statusCode: number,
    message: string = STATUS_CODES[statusCode] ?? "Error",
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return this.details === undefined
      ? { message: this.message }
      : { message: this.message, details: this.details };
  }
}

// 4xx

export class BadRequestException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(400, message, details);
  }
}

export class UnauthorizedException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(401, message, details);
  }
}

export class ForbiddenException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(403, message, details);
  }
}

export class NotFoundException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(404, message, details);
  }
}

/** Carries the methods the path does accept, for the `allow` header. */
export class MethodNotAllowedException extends HttpException {
  constructor(
    message?: string,
    details?: unknown,
    public readonly allowed: readonly string[] = [],
  ) {
    super(405, message, details);
  }
}

export class NotAcceptableException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(406, message, details);
  }
}

export class ConflictException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(409, message, details);
  }
}

export class GoneException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(410, message, details);
  }
}

export class PayloadTooLargeException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(413, message, details);
  }
}

export class UnprocessableEntityException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(422, message, details);
  }
}

export class TooManyRequestsException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(429, message, details);
  }
}

// 5xx

export class InternalServerErrorException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(500, message, details);
  }
}

export class NotImplementedException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(501, message, details);
  }
}

export class BadGatewayException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(502, message, details);
  }
}

export class ServiceUnavailableException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(503, message, details);
  }
}

export class GatewayTimeoutException extends HttpException {
  constructor(message?: string, details?: unknown) {
    super(504, message, details);
  }
}
