import type { Request, Response, NextFunction } from "express";
import { nanoid } from "nanoid";
import { runWithContext, type CorrelationContext } from "./correlationContext";
import { createLogger } from "../utils/logger";

const logger = createLogger("http");

export function requestLoggerMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const traceId = nanoid(16);
  const startTime = Date.now();

  res.setHeader("X-Trace-Id", traceId);
  res.locals.traceId = traceId;

  const context: CorrelationContext = { traceId, startTime };

  runWithContext(context, () => {
    const requestLogger = logger.child({ traceId });

    requestLogger.debug("Request started", {
      method: req.method,
      path: req.path,
      userAgent: req.get("user-agent"),
      ip: req.ip || req.socket.remoteAddress,
    });

    res.on("finish", () => {
      const logMethod = res.statusCode >= 400 ? "warn" : "info";
      requestLogger[logMethod]("Request completed", {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  });
}
