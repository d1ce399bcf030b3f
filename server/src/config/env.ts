import dotenv from "dotenv";
import { z } from "zod";
import { describeZodError } from "../utils/zodError";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  PGSSL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  PG_POOL_MAX: z.coerce.number().int().min(1).default(10),
  // any morgan format name or format string; "off" disables the request log
  LOG_FORMAT: z.string().min(1).default("dev"),
});

export type AppConfig = {
  port: number;
  databaseUrl: string;
  pgSsl: boolean;
  pgPoolMax: number;
  logFormat: string | null;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeZodError(parsed.error)}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    pgSsl: e.PGSSL,
    pgPoolMax: e.PG_POOL_MAX,
    logFormat: e.LOG_FORMAT === "off" ? null : e.LOG_FORMAT,
  });
}

/** Reads `.env` into `process.env`, then validates it. */
export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
