// src/server.ts
//
// Runtime entrypoint: builds the app via `buildApp()` (which wires plugins and
// routes without listening), starts listening on HOST/PORT and closes the app
// on SIGTERM/SIGINT so in-flight portal calls can finish.
import { buildApp } from "./app";
import { env } from "./config/env";
import { logger } from "./utils/logger";

const start = async () => {
  const app = buildApp();

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGTERM", (signal) => void shutdown(signal));
  process.once("SIGINT", (signal) => void shutdown(signal));

  try {
    await app.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logger.info(`Server running on http://${env.HOST}:${env.PORT}`);
    logger.info(
      `Swagger docs available at http://${env.HOST}:${env.PORT}/docs`
    );
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

void start();
