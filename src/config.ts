import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().min(1).default("0.0.0.0"),
  NODE_ENV: z.string().min(1).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1024 * 1024 * 2),
  MAX_CONTENT_CHARS: z.coerce.number().int().positive().default(200000)
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppConfig = {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  maxContentChars: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank variables fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    bodyLimitBytes: e.BODY_LIMIT_BYTES,
    maxContentChars: e.MAX_CONTENT_CHARS
  };
}
