/**
 * Slot allocation backend (entry point)
 *
 * Thin shell: context creation, startup and graceful shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, createLogger, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";

const bootLogger = createLogger();

try {
  const ctx = createContext({ logger: bootLogger });
  const { logger, db } = ctx;
  const app = createApp(ctx);

  const server = app.listen(runtimeConfig.port, runtimeConfig.bindHost, () => {
    logger.info({ port: runtimeConfig.port, host: runtimeConfig.bindHost }, "Slot allocation backend listening");
  });

  const shutdown = () => {
    logger.info("Received termination signal, initiating graceful shutdown");

    server.close(() => {
      logger.info("HTTP server closed");
      db.close();
      logger.info("Database connection closed, graceful shutdown complete");
      process.exit(0);
    });

    setTimeout(() => {
      logger.warn(
        { timeoutMs: runtimeConfig.gracefulShutdownMs },
        "Graceful shutdown timeout exceeded, forcing exit",
      );
      process.exit(1);
    }, runtimeConfig.gracefulShutdownMs).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
} catch (error) {
  // Configuration and consistency errors stop the experiment before any session starts
  bootLogger.fatal({ err: error }, "Fatal error during server startup");
  process.exit(1);
}
