import pino from "pino";
import { env } from "../config/env";

// Process-wide logger for services and bootstrap; routes use `request.log`.
export const logger = pino({
  name: "consumer-court-search-api",
  level: env.LOG_LEVEL,
  enabled: env.NODE_ENV !== "test",
});
