export type StorageDriver = "mongo" | "memory";

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Storage
  storageDriver: StorageDriver;
  mongodbUrl: string;
  mongodbDbName: string;

  // JWT
  jwtSecret: string;
  jwtExpiresIn: string;

  // Password Hashing (Argon2)
  argon2MemoryCost: number;
  argon2TimeCost: number;
  argon2Parallelism: number;

  // Logging
  logLevel: string;
  jsonLogFormat: boolean;

  // CORS
  corsEnabled: boolean;
  corsAllowedOrigins: string[];
}

type Env = Record<string, string | undefined>;

const DURATION_PATTERN = /^\d+[smhd]$/;

const DEFAULT_SECRET_PATTERNS = [
  "default-secret",
  "change-in-production",
  "replace-me",
  "secret",
  "password",
  "123456",
];

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readList(env: Env, key: string): string[] {
  const raw = env[key];
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readStorageDriver(env: Env): StorageDriver {
  const raw = env.STORAGE_DRIVER || "mongo";
  if (raw !== "mongo" && raw !== "memory") {
    throw new Error(`STORAGE_DRIVER must be "mongo" or "memory", got "${raw}"`);
  }
  return raw;
}

const isDefaultSecret = (secret: string): boolean =>
  DEFAULT_SECRET_PATTERNS.some((pattern) =>
    secret.toLowerCase().includes(pattern),
  );

/**
 * Build the process configuration from environment variables.
 *
 * Called once at startup; the frozen result is handed to the services that
 * need it instead of being read from a module-level global.
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error("Missing required environment variables: JWT_SECRET");
  }

  const nodeEnv = env.NODE_ENV || "development";
  if (nodeEnv === "production" && isDefaultSecret(jwtSecret)) {
    throw new Error(
      "JWT_SECRET must be set to a secure value in production. " +
        "Default placeholder values are not allowed. " +
        "Generate a secure random secret using: openssl rand -base64 32",
    );
  }

  const jwtExpiresIn = env.JWT_EXPIRES_IN || "30m";
  if (!DURATION_PATTERN.test(jwtExpiresIn)) {
    throw new Error(
      `JWT_EXPIRES_IN must look like 30m, 1h or 45s, got "${jwtExpiresIn}"`,
    );
  }

  const config: Config = {
    port: readInt(env, "PORT", 3000),
    nodeEnv,

    storageDriver: readStorageDriver(env),
    mongodbUrl: env.MONGODB_URL || "mongodb://localhost:27017",
    mongodbDbName: env.MONGODB_DB_NAME || "org_master_db",

    jwtSecret,
    jwtExpiresIn,

    argon2MemoryCost: readInt(env, "ARGON2_MEMORY_COST", 65536),
    argon2TimeCost: readInt(env, "ARGON2_TIME_COST", 3),
    argon2Parallelism: readInt(env, "ARGON2_PARALLELISM", 1),

    logLevel: env.LOG_LEVEL || "info",
    jsonLogFormat: env.JSON_LOG_FORMAT === "true",

    corsEnabled: env.CORS_ENABLED === "true",
    corsAllowedOrigins: readList(env, "CORS_ALLOWED_ORIGINS"),
  };

  return Object.freeze(config);
}
