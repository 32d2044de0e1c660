import type { HttpMethod, RequestView } from "./types";

export const DEFAULT_DOCUMENT = "index.html";

export function toHttpMethod(method: string | undefined): HttpMethod {
  switch (method) {
    case "GET":
    case "HEAD":
      return method;
    default:
      return "OTHER";
  }
}

/**
 * Derives the relative file path a request asks for, or null when the
 * request is not a static file lookup at all.
 */
export function extractCandidatePath(request: RequestView): string | null {
  if (request.method === "OTHER") return null;
  if (!request.path) return null;

  if (request.path === "/") return DEFAULT_DOCUMENT;
  // Exactly one character: the leading slash.
  return request.path.slice(1);
}
