// ──────────────────────────────────────────────
// Nodeplate - Environment Configuration Helper
// ──────────────────────────────────────────────

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export type StoreDriver = "postgres" | "memory";

export const STORE_DRIVERS: StoreDriver[] = ["postgres", "memory"];

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;

  store: {
    driver: StoreDriver;
    // Only read when the driver is "postgres"
    databaseUrl: string | null;
  };

  cache: {
    ttlMs: number;
  };
}

function getStoreDriver(): StoreDriver {
  const value = getEnvOrDefault("STORE_DRIVER", "postgres");
  const driver = STORE_DRIVERS.find((candidate) => candidate === value);
  if (!driver) {
    throw new Error(
      `Environment variable STORE_DRIVER must be one of ${STORE_DRIVERS.join(", ")}, got: ${value}`
    );
  }
  return driver;
}

export function loadConfig(): AppConfig {
  const driver = getStoreDriver();

  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    store: {
      driver,
      databaseUrl: driver === "postgres" ? getEnvOrThrow("DATABASE_URL") : null,
    },

    cache: {
      ttlMs: getEnvAsNumber("CACHE_TTL_MS", 30_000),
    },
  };
}
