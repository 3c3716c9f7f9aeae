/**
 * Runtime configuration, read once at startup from the environment.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_DB_PATH = "./data/tags.db";

export const ConfigSchema = Type.Object({
  dbPath: Type.String({ minLength: 1, default: DEFAULT_DB_PATH }),
  accountId: Type.Integer({ minimum: 1 }),
  apiKey: Type.String({ minLength: 1 }),
  tagIdFieldName: Type.String({ minLength: 1, default: "TagId" }),
  trainingFieldName: Type.String({
    minLength: 1,
    default: "Safety Training",
  }),
  syncIntervalMs: Type.Integer({ minimum: 1000, default: 6 * 60 * 1000 }),
  directoryTimeoutMs: Type.Integer({ minimum: 1, default: 30_000 }),
  syncOnStart: Type.Boolean({ default: true }),
  port: Type.Integer({ minimum: 0, maximum: 65_535, default: 3000 }),
  host: Type.String({ minLength: 1, default: "0.0.0.0" }),
});

export type Config = Static<typeof ConfigSchema>;

/**
 * Upstream field names holding the tag id and the completed trainings.
 */
export interface FieldNames {
  tagIdField: string;
  trainingField: string;
}

type ConfigKey = keyof Config;

const ENV_VARS: Record<ConfigKey, string> = {
  dbPath: "DB_PATH",
  accountId: "WILD_APRICOT_ACCOUNT_ID",
  apiKey: "WILD_APRICOT_API_KEY",
  tagIdFieldName: "TAG_ID_FIELD_NAME",
  trainingFieldName: "TRAINING_FIELD_NAME",
  syncIntervalMs: "SYNC_INTERVAL_MS",
  directoryTimeoutMs: "DIRECTORY_TIMEOUT_MS",
  syncOnStart: "SYNC_ON_START",
  port: "PORT",
  host: "HOST",
};

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(ENV_VARS, key);
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build the configuration from environment variables.
 * Unset and empty variables fall back to their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [key, envVar] of Object.entries(ENV_VARS)) {
    const value = env[envVar]?.trim();
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(
    ConfigSchema,
    Value.Default(ConfigSchema, raw)
  );

  if (!Value.Check(ConfigSchema, candidate)) {
    const first = Value.Errors(ConfigSchema, candidate).First();
    const key = first?.path.replace(/^\//, "") ?? "";
    const envVar = isConfigKey(key) ? ENV_VARS[key] : key;
    throw new ConfigError(
      `Invalid configuration for ${envVar}: ${first?.message ?? "unknown error"}`
    );
  }

  return candidate;
}

export function fieldNamesFrom(config: Config): FieldNames {
  return {
    tagIdField: config.tagIdFieldName,
    trainingField: config.trainingFieldName,
  };
}

/**
 * Store location alone, for commands that never talk to the directory.
 */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const value = env[ENV_VARS.dbPath]?.trim();
  return value !== undefined && value !== "" ? value : DEFAULT_DB_PATH;
}
