import { createServer } from "http";
import { createApp } from "./app";
import { parseEnv } from "./config/env";
import { createLogger } from "./utils/logger";

const logger = createLogger("server");

function main(): void {
  const env = parseEnv();
  const app = createApp({ staticRoot: env.STATIC_ROOT });
  const httpServer = createServer(app);

  httpServer.on("error", (err) => {
    logger.error("Server error", { error: err.message });
    process.exitCode = 1;
  });

  httpServer.listen(env.PORT, env.HOST, () => {
    logger.info(`Listening on http://${env.HOST}:${env.PORT}`, { env: env.NODE_ENV });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down", { signal });
    httpServer.close((err) => {
      if (err) {
        logger.error("Error while closing server", { error: err.message });
        process.exitCode = 1;
      }
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  logger.error("Failed to start", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
}
