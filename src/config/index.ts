import fs from "fs";
import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "../logger";

dotenv.config({
  quiet: process.env.NODE_ENV === "test",
});

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  GNEWS_API_KEY: optionalString,
  HOST: z.string().min(1).default("localhost"),
  PORT: z.coerce.number().int().min(0).max(65535).default(10000),
  GNEWS_CACHE_DIR: optionalString,
  VALKEY_HOST: optionalString,
  VALKEY_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  VALKEY_PASSWORD: optionalString,
  VALKEY_PASSWORD_FILE: optionalString,
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type Env = z.infer<typeof envSchema>;

export interface ValkeyConfig {
  host: string;
  port: number;
  password?: string;
}

export interface AppConfig {
  apiKey?: string;
  host: string;
  port: number;
  cacheDir?: string;
  valkey?: ValkeyConfig;
  nodeEnv: Env["NODE_ENV"];
}

/**
 * Docker secrets arrive as a path under /run/secrets/;
 * anything else is taken as the literal value.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (value.startsWith("/run/secrets/")) {
    try {
      return fs.readFileSync(value, "utf8").trim() || undefined;
    } catch {
      logger.warn({ path: value }, "Failed to read secret file; tool calls will fail until it is provided");
      return undefined;
    }
  }
  return value;
}

function readPasswordFile(path: string | undefined): string | undefined {
  if (!path) return undefined;
  try {
    return fs.readFileSync(path, "utf8").trim();
  } catch {
    logger.warn("Failed to read Valkey password from secret file");
    return undefined;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  const valkey: ValkeyConfig | undefined = env.VALKEY_HOST
    ? {
        host: env.VALKEY_HOST,
        port: env.VALKEY_PORT,
        password:
          env.VALKEY_PASSWORD ?? readPasswordFile(env.VALKEY_PASSWORD_FILE),
      }
    : undefined;

  return {
    apiKey: resolveSecret(env.GNEWS_API_KEY),
    host: env.HOST,
    port: env.PORT,
    cacheDir: env.GNEWS_CACHE_DIR,
    valkey,
    nodeEnv: env.NODE_ENV,
  };
}
