// src/app.ts
import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { env } from "./config/env";

// Plugins
import swaggerPlugin from "./plugins/swagger";
import errorHandlerPlugin from "./plugins/error-handler";
import portalPlugin, { type PortalPluginOptions } from "./plugins/portal";

// Routes
import casesRoutes from "./routes/cases";
import directoryRoutes from "./routes/directory";

export const SERVICE_NAME = "consumer-court-search-api";
export const SERVICE_VERSION = "1.0.0";

export interface AppDependencies {
  portal?: PortalPluginOptions;
}

export function buildApp(
  opts: FastifyServerOptions = {},
  deps: AppDependencies = {}
) {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    ...opts,
  });

  // Security plugins
  app.register(helmet);
  app.register(cors, {
    origin: env.CORS_ORIGIN === "*" ? true : env.CORS_ORIGIN.split(","),
    credentials: true,
  });

  // Core plugins
  app.register(errorHandlerPlugin);
  app.register(swaggerPlugin);
  app.register(portalPlugin, deps.portal ?? {});

  app.addHook("onReady", async () => {
    app.log.info("Consumer court search API ready");
  });
  app.addHook("onClose", async () => {
    app.log.info("Consumer court search API shutting down");
  });

  app.get("/", async () => ({
    message: "Consumer court case search API",
    version: SERVICE_VERSION,
    docs: "/docs",
  }));

  // Health check
  app.get("/health", async () => ({ status: "healthy", service: SERVICE_NAME }));

  // API Routes
  app.register(casesRoutes, { prefix: "/cases" });
  app.register(directoryRoutes);

  return app;
}
