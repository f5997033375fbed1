import createDebug from "debug";
import type {
  HandlerContext,
  HandlerResponse,
  HttpRequest,
  NextFunction,
  PlinthLayer,
  SecuritySchemeDefinition,
} from "@plinth/types";
import { decodeBasicCredentials, parseAuthorizationHeader } from "@plinth/common";
import { UnauthorizedException } from "../errors/http-exception";

const debug = createDebug("plinth:core:security");

export type Credentials =
  | { type: "bearer"; token: string }
  | { type: "basic"; username: string; password: string }
  | { type: "apiKey"; key: string };

export type SecuritySchemeOptions = SecuritySchemeDefinition & {
  /**
   * Verifies presented credentials. Resolving to `null`, `undefined` or
   * `false` rejects them; anything else is stored under `request.auth[scheme]`.
   * Without it, any presented credentials are accepted as-is.
   */
  authenticate?: (credentials: Credentials, request: HttpRequest) => unknown;
};

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function extractCredentials(scheme: SecuritySchemeDefinition, request: HttpRequest): Credentials | null {
  if (scheme.type === "apiKey") {
    const source = scheme.in === "header" ? request.headers[scheme.name.toLowerCase()] : request.query[scheme.name];
    const key = firstValue(source);
    return key ? { type: "apiKey", key } : null;
  }

  const header = parseAuthorizationHeader(request.headers.authorization);
  if (!header || header.scheme !== scheme.scheme) return null;
  if (scheme.scheme === "bearer") {
    return { type: "bearer", token: header.credentials };
  }
  const basic = decodeBasicCredentials(header.credentials);
  return basic ? { type: "basic", ...basic } : null;
}

/**
 * Enforces a route's security requirement. Schemes are tried in order and
 * the first one that accepts the request satisfies it.
 */
export class SecurityLayer implements PlinthLayer {
  constructor(
    private readonly requirement: readonly string[],
    private readonly schemes: Readonly<Record<string, SecuritySchemeOptions>>,
  ) {}

  async handle(context: HandlerContext, next: NextFunction<HandlerResponse>): Promise<HandlerResponse> {
    const { request } = context;
    let presented = false;

    for (const name of this.requirement) {
      const scheme = this.schemes[name];
      if (!scheme) continue;

      const credentials = extractCredentials(scheme, request);
      if (!credentials) continue;
      presented = true;

      const result = scheme.authenticate ? await scheme.authenticate(credentials, request) : credentials;
      if (result === null || result === undefined || result === false) {
        debug("scheme %s rejected credentials", name);
        continue;
      }

      request.auth = { ...(request.auth ?? {}), [name]: result };
      return next();
    }

    throw new UnauthorizedException(presented ? "Invalid credentials" : "Missing credentials");
  }
}
