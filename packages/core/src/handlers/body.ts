import type { HttpRequest } from "@plinth/types";
import { BadRequestException } from "../errors/http-exception";

/**
 * Decodes the request body: JSON when the content type says so (or none is
 * given), the raw text or bytes otherwise. `undefined` when there is no body.
 */
export function decodeBody(request: HttpRequest): unknown {
  if (request.binaryBody && !request.textBody) return request.binaryBody;
  if (request.textBody === null || request.textBody === "") return undefined;

  const contentType = request.contentType?.toLowerCase() ?? "";
  if (contentType !== "" && !contentType.includes("json")) return request.textBody;

  try {
    const parsed: unknown = JSON.parse(request.textBody);
    return parsed;
  } catch {
    throw new BadRequestException("Malformed JSON body");
  }
}
