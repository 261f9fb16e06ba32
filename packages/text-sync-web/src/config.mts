import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// z.coerce.boolean() would read "false" as true
const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  SERVER_HOST: z.string().min(1).default("0.0.0.0"),
  SERVER_PORT: z.coerce.number().int().min(0).max(65535).default(1133),
  TEXT_FILE: z.string().min(1).default("shared_text.txt"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MAX_CONTENT_BYTES: z.coerce.number().int().positive().default(1_048_576),
  SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  ATOMIC_WRITES: flag
});

export interface ServerConfig {
  host: string;
  port: number;
  textFile: string;
  logLevel: LogLevel;
  maxContentBytes: number;
  sendTimeoutMs: number;
  atomicWrites: boolean;
}

/**
 * Reads the server settings from environment variables. Throws when a
 * variable is present but unusable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.flatten().fieldErrors;
    throw new Error(`Invalid environment: ${JSON.stringify(fields)}`);
  }

  const parsed = result.data;
  return {
    host: parsed.SERVER_HOST,
    port: parsed.SERVER_PORT,
    textFile: parsed.TEXT_FILE,
    logLevel: parsed.LOG_LEVEL,
    maxContentBytes: parsed.MAX_CONTENT_BYTES,
    sendTimeoutMs: parsed.SEND_TIMEOUT_MS,
    atomicWrites: parsed.ATOMIC_WRITES
  };
}

export function serverUrl(config: ServerConfig): string {
  const host = config.host === "0.0.0.0" ? "localhost" : config.host;
  return `http://${host}:${config.port}`;
}

export function websocketUrl(config: ServerConfig): string {
  const host = config.host === "0.0.0.0" ? "localhost" : config.host;
  return `ws://${host}:${config.port}/ws`;
}
