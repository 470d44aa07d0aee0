/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

export const DEFAULT_TABLE_NAME = "BlogContent";
export const DEFAULT_ENDPOINT = "http://localhost:8000";

const envSchema = z.object({
  // Store
  TABLE_NAME: z.string().min(1).default(DEFAULT_TABLE_NAME),
  DYNAMODB_ENDPOINT: z.string().url().default(DEFAULT_ENDPOINT),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export interface StoreConfig {
  tableName: string;
  /** Store endpoint; from the environment it defaults to DynamoDB Local. Unset means the regional AWS endpoint. */
  endpoint?: string;
  region: string;
  timeoutMs: number;
}

export interface AppConfig {
  store: StoreConfig;

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    logFormat: "pretty" | "json";
    nodeEnv: "development" | "production" | "test";
  };
}

let configInstance: AppConfig | null = null;

/**
 * Load and validate configuration from the given environment
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      variables: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    store: {
      tableName: env.TABLE_NAME,
      endpoint: env.DYNAMODB_ENDPOINT,
      region: env.AWS_REGION,
      timeoutMs: env.STORE_TIMEOUT_MS,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      logFormat: env.LOG_FORMAT,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
