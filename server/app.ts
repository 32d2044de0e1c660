import express, { type Express } from "express";
import { requestLoggerMiddleware } from "./middleware/requestLogger";
import { staticFiles } from "./middleware/staticFiles";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

export interface AppOptions {
  staticRoot: string;
}

export function createApp({ staticRoot }: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestLoggerMiddleware);
  app.use(staticFiles(staticRoot));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
