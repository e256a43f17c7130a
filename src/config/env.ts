// src/config/env.ts
import * as dotenv from "dotenv";
import { z } from "zod";

dotenv.config(); // load .env into process.env

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((value) => ["1", "true", "yes", "on"].includes(value));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DEBUG_MODE: flag.optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().max(2_147_483_647).default(30000),
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  LINEAR_API_URL: z.string().url().default("https://api.linear.app/graphql"),
});

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type AppConfig = {
  port: number;
  nodeEnv: "development" | "production" | "test";
  debug: boolean;
  logLevel: LogLevel;
  handlerTimeoutMs: number;
  github: { baseUrl: string };
  linear: { baseUrl: string };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings in .env mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  const debug = vars.DEBUG_MODE ?? vars.NODE_ENV !== "production";

  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    debug,
    logLevel: vars.LOG_LEVEL ?? (debug ? "debug" : "info"),
    handlerTimeoutMs: vars.HANDLER_TIMEOUT_MS,
    github: { baseUrl: vars.GITHUB_API_URL },
    linear: { baseUrl: vars.LINEAR_API_URL },
  };
}

export const config: Readonly<AppConfig> = Object.freeze(loadConfig());

/**
 * Looks up the secret a service refers to. Secrets never live in `config`, only
 * the name of the variable holding them does.
 */
export function resolveCredential(
  credentialRef: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[credentialRef];
  return value ? value : undefined;
}
