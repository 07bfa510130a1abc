// src/lib/config.ts
// Purpose: Single parse of process.env into a typed, validated runtime config.

import { z } from "zod";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    MODE: z.enum(["production", "MOCK"]).default("production"),
    PORT: z.coerce.number().int().positive().default(3001),
    DATABASE_URL: z.string().min(1).optional(),
    REDIS_URL: z.string().min(1).optional(),
    CORS_ORIGIN: z.string().default("http://localhost:3000"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("INFO"),
    MAX_UPLOAD_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(20 * 1024 * 1024),
    ALLOWED_MEDIA_TYPES: z.string().default("application/pdf"),
    REPORT_LOCK_TTL_MS: z.coerce.number().int().positive().default(30_000),
  })
  .superRefine((env, ctx) => {
    if (env.MODE !== "MOCK" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required unless MODE=MOCK",
      });
    }
  });

export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppConfig = {
  nodeEnv: string;
  mode: "production" | "MOCK";
  port: number;
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  corsOrigin: string;
  logLevel: LogLevel;
  maxUploadBytes: number;
  allowedMediaTypes: readonly string[];
  reportLockTtlMs: number;
};

export class ConfigError extends Error {
  constructor(public readonly details: Record<string, string[] | undefined>) {
    super("Invalid environment configuration");
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  const data = parsed.data;

  return {
    nodeEnv: data.NODE_ENV,
    mode: data.MODE,
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    redisUrl: data.REDIS_URL,
    corsOrigin: data.CORS_ORIGIN,
    logLevel: data.LOG_LEVEL,
    maxUploadBytes: data.MAX_UPLOAD_BYTES,
    allowedMediaTypes: data.ALLOWED_MEDIA_TYPES.split(",")
      .map((t) => t.trim().toLowerCase())
      .filter(Boolean),
    reportLockTtlMs: data.REPORT_LOCK_TTL_MS,
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
