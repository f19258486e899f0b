import { ConfigError } from "./errors";

export type StoreKind = "mongo" | "memory";

export interface MongoSettings {
  mongoUri: string;
  dbName: string;
  collectionName: string;
  storeTimeoutMs: number;
}

interface BaseConfig {
  port: number;
  host: string;
  logFormat: string;
  storeTimeoutMs: number;
  shutdownTimeoutMs: number;
}

export type AppConfig = BaseConfig &
  ({ store: "mongo"; mongo: MongoSettings } | { store: "memory" });

const DEFAULT_PORT = 9010;
const DEFAULT_TIMEOUT_MS = 5000;

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function storeKind(raw: string | undefined): StoreKind {
  const kind = (raw?.trim() || "mongo").toLowerCase();
  if (kind !== "mongo" && kind !== "memory") {
    throw new ConfigError(`TODO_STORE must be "mongo" or "memory", got "${raw}"`);
  }
  return kind;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storeTimeoutMs = positiveInt(env, "STORE_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
  const base: BaseConfig = {
    port: positiveInt(env, "PORT", DEFAULT_PORT),
    host: env.HOST?.trim() || "0.0.0.0",
    logFormat: env.LOG_FORMAT?.trim() || "dev",
    storeTimeoutMs,
    shutdownTimeoutMs: positiveInt(env, "SHUTDOWN_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
  };

  if (storeKind(env.TODO_STORE) === "memory") {
    return { ...base, store: "memory" };
  }

  const mongoUri = env.MONGO_URI?.trim();
  if (!mongoUri) {
    throw new ConfigError("MONGO_URI environment variable is not set");
  }
  return {
    ...base,
    store: "mongo",
    mongo: {
      mongoUri,
      dbName: env.MONGO_DB_NAME?.trim() || "demo_todo",
      collectionName: env.MONGO_COLLECTION?.trim() || "todo",
      storeTimeoutMs,
    },
  };
}
