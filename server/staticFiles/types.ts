import type { DecodeError, UnsafePathError } from "../utils/errors";

export type HttpMethod = "GET" | "HEAD" | "OTHER";

/**
 * What the resolver reads from an incoming request. `path` is the URL path
 * without its query string, or null when the host could not supply one.
 */
export interface RequestView {
  readonly method: HttpMethod;
  readonly path: string | null;
}

export type RejectionError = DecodeError | UnsafePathError;

export type ResolutionOutcome =
  | { kind: "serve"; path: string }
  | { kind: "pass" }
  | { kind: "reject"; error: RejectionError };
