import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  CORS_ORIGIN: z.string().default("*"),

  PORTAL_BASE_URL: z.string().url().default("https://e-jagriti.gov.in"),
  PORTAL_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  PORTAL_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  PORTAL_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),

  // Applied when a search request omits its date range.
  DEFAULT_FROM_DATE: isoDate.default("2025-01-01"),
  DEFAULT_TO_DATE: isoDate.default("2025-09-03"),
});

export const env = envSchema.parse(process.env);

export type Env = z.infer<typeof envSchema>;
