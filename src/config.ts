import * as dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

// クライアントは同梱しないので、既定ではクロスオリジンを許可しない
const DEFAULT_ORIGINS: string[] = [];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGINS: z.string().optional(),
  API_PREFIX: z.string().regex(/^\/[\w\-/]*$/, "must start with '/'").default("/showdown"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface AppConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  apiPrefix: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const configured = parsed.CORS_ORIGINS?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    corsOrigins: configured && configured.length > 0 ? configured : DEFAULT_ORIGINS,
    apiPrefix: parsed.API_PREFIX.replace(/\/+$/, ""),
    logLevel: parsed.LOG_LEVEL,
  };
}
