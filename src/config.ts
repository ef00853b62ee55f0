import { z } from "zod";

export const DEFAULT_SECRET_KEY = "dev-secret-key-change-in-production";

// Symmetric algorithms only: the signing key is a shared secret.
export const TOKEN_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_FILE: z.string().min(1).default("./products.db"),
  JWT_SECRET_KEY: z.string().min(1).default(DEFAULT_SECRET_KEY),
  JWT_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default("HS256"),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(20),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  NODE_ENV: z.string().default("development"),
});

export interface TokenConfig {
  secretKey: string;
  algorithm: TokenAlgorithm;
  accessTokenTtlMinutes: number;
}

export interface AppConfig {
  port: number;
  databaseFile: string;
  token: TokenConfig;
  corsOrigin: string | string[];
  logLevel: string;
  nodeEnv: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank entries in a .env file mean "use the default".
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.parse(present);

  const origins = parsed.CORS_ORIGIN.split(",").map((o) => o.trim()).filter(Boolean);

  return {
    port: parsed.PORT,
    databaseFile: parsed.DATABASE_FILE,
    token: {
      secretKey: parsed.JWT_SECRET_KEY,
      algorithm: parsed.JWT_ALGORITHM,
      accessTokenTtlMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
    corsOrigin: origins.length === 1 ? origins[0] : origins,
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
  };
}
