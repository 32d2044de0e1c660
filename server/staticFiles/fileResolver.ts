import path from "path";
import { stat } from "fs/promises";
import { DecodeError, errorCode, UnsafePathError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { extractCandidatePath } from "./pathExtractor";
import { percentDecode } from "./percentDecoder";
import { isSafePath } from "./safePath";
import type { RequestView, ResolutionOutcome } from "./types";

const logger = createLogger("static-files");

// Absence of the file or of one of its parent directories.
const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Maps requests onto regular files below a fixed root directory.
 *
 * The root is resolved once, here, and is never derived from request input.
 * Each `resolve` call performs at most one `stat` and reads no file content;
 * sending the bytes is left to whoever acts on a `serve` outcome.
 */
export class StaticFileResolver {
  readonly rootPath: string;

  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
    logger.info("Serving static files", { root: this.rootPath });
  }

  async resolve(request: RequestView): Promise<ResolutionOutcome> {
    const candidate = extractCandidatePath(request);
    if (candidate === null) return { kind: "pass" };

    logger.debug("Static file lookup", {
      method: request.method,
      root: this.rootPath,
      path: request.path,
    });

    let decoded: string;
    try {
      decoded = percentDecode(candidate);
    } catch (error) {
      if (error instanceof DecodeError) return { kind: "reject", error };
      throw error;
    }

    return this.resolveDecoded(decoded);
  }

  private async resolveDecoded(relativePath: string): Promise<ResolutionOutcome> {
    if (!isSafePath(relativePath)) {
      return { kind: "reject", error: new UnsafePathError(relativePath) };
    }

    const filePath = path.join(this.rootPath, relativePath);
    try {
      const stats = await stat(filePath);
      return stats.isFile() ? { kind: "serve", path: filePath } : { kind: "pass" };
    } catch (error) {
      const code = errorCode(error);
      if (!code || !MISSING_CODES.has(code)) {
        logger.warn("Could not read file metadata", {
          path: filePath,
          code,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return { kind: "pass" };
    }
  }
}
