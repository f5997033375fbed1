export type PathSegment =
  | { type: "literal"; value: string }
  | { type: "param"; name: string };

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Joins a router prefix with a route path. Both use the `{param}` format.
 *
 * @example
 * joinRoutePath("/users", "/{id}") => "/users/{id}"
 * joinRoutePath("/", "/health") => "/health"
 * joinRoutePath("/api/", "v1/") => "/api/v1"
 */
export function joinRoutePath(prefix: string, routePath: string): string {
  return `/${prefix}/${routePath}`.replaceAll(/\/+/g, "/").replace(/\/$/, "") || "/";
}

/**
 * Splits a normalised path template into literal and parameter segments.
 * Throws a TypeError for malformed parameter segments.
 */
export function parsePathTemplate(template: string): PathSegment[] {
  const parts = template.split("/").filter(Boolean);
  return parts.map((part) => {
    if (part.startsWith("{") && part.endsWith("}")) {
      const name = part.slice(1, -1);
      if (!PARAM_NAME.test(name)) {
        throw new TypeError(`Invalid path template "${template}": bad parameter name "${name}"`);
      }
      return { type: "param", name };
    }
    if (part.includes("{") || part.includes("}")) {
      throw new TypeError(
        `Invalid path template "${template}": parameters must span a whole segment ("${part}")`,
      );
    }
    return { type: "literal", value: part };
  });
}

/** Parameter names in template order. */
export function pathParamNames(segments: readonly PathSegment[]): string[] {
  return segments.flatMap((s) => (s.type === "param" ? [s.name] : []));
}

/**
 * Key under which two templates collide: parameter names are erased, so
 * `/users/{id}` and `/users/{userId}` share a key.
 */
export function pathShapeKey(segments: readonly PathSegment[]): string {
  return "/" + segments.map((s) => (s.type === "param" ? "{}" : s.value)).join("/");
}

/**
 * Matches a concrete request path against template segments.
 * Returns decoded parameter values, or null when the path does not match.
 */
export function matchPathSegments(
  segments: readonly PathSegment[],
  actualPath: string,
): Record<string, string> | null {
  const actualParts = actualPath.split("/").filter(Boolean);
  if (actualParts.length !== segments.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const actual = actualParts[i];
    if (segment.type === "literal") {
      if (segment.value !== actual) return null;
      continue;
    }
    try {
      params[segment.name] = decodeURIComponent(actual);
    } catch {
      // Undecodable percent-escape: treat the segment as not matching.
      return null;
    }
  }
  return params;
}
