/**
 * Extract a user identifier from the auth context.
 *
 * Auth context is a security-scheme-keyed map of whatever each scheme's
 * `authenticate` callback returned, e.g.:
 *   { bearerAuth: { sub: "user-42", scope: "read" }, apiKey: { userId: 104932 } }
 *
 * Walks the results looking for the first string or number in priority order:
 *   1. claims.sub  (JWT verifiers that wrap claims)
 *   2. sub
 *   3. userId
 *   4. user_id
 */
export function extractUserId(auth: Record<string, unknown> | null): string | undefined {
  if (!auth) return undefined;

  for (const result of Object.values(auth)) {
    if (typeof result !== "object" || result === null) continue;
    const r = result as Record<string, unknown>;

    if (typeof r.claims === "object" && r.claims !== null) {
      const claims = r.claims as Record<string, unknown>;
      if (isStringOrNumber(claims.sub)) return String(claims.sub);
    }

    if (isStringOrNumber(r.sub)) return String(r.sub);
    if (isStringOrNumber(r.userId)) return String(r.userId);
    if (isStringOrNumber(r.user_id)) return String(r.user_id);
  }

  return undefined;
}

function isStringOrNumber(value: unknown): value is string | number {
  return typeof value === "string" || typeof value === "number";
}

export type AuthorizationHeader = {
  scheme: string;
  credentials: string;
};

/**
 * Splits an `Authorization` header into its scheme (lower-cased) and credentials.
 * Returns null when the header is absent or has no credentials part.
 */
export function parseAuthorizationHeader(
  header: string | string[] | undefined,
): AuthorizationHeader | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;

  const trimmed = value.trim();
  const spaceIndex = trimmed.indexOf(" ");
  if (spaceIndex <= 0) return null;

  const credentials = trimmed.slice(spaceIndex + 1).trim();
  if (!credentials) return null;

  return { scheme: trimmed.slice(0, spaceIndex).toLowerCase(), credentials };
}

/** Decodes `user:password` Basic credentials. Returns null on malformed input. */
export function decodeBasicCredentials(
  encoded: string,
): { username: string; password: string } | null {
  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const colonIndex = decoded.indexOf(":");
  if (colonIndex < 0) return null;
  return { username: decoded.slice(0, colonIndex), password: decoded.slice(colonIndex + 1) };
}
