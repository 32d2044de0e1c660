import type { Request, Response, NextFunction, RequestHandler } from "express";
import { StaticFileResolver, toHttpMethod } from "../staticFiles";

/**
 * Serves regular files found below `rootPath` for GET and HEAD requests.
 *
 * Requests that do not map onto a file fall through to the next handler;
 * undecodable or escaping paths are forwarded to the error handler as 400s.
 */
export function staticFiles(rootPath: string): RequestHandler {
  const resolver = new StaticFileResolver(rootPath);

  return (req: Request, res: Response, next: NextFunction): void => {
    resolver
      .resolve({ method: toHttpMethod(req.method), path: req.path || null })
      .then((outcome) => {
        switch (outcome.kind) {
          case "serve":
            // Path safety is already settled, so dotfiles are not special here.
            res.sendFile(outcome.path, { dotfiles: "allow" }, (err) => {
              if (err) next(err);
            });
            return;
          case "reject":
            next(outcome.error);
            return;
          case "pass":
            next();
            return;
        }
      })
      .catch(next);
  };
}
