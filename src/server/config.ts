import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("127.0.0.1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  /** Largest accepted upload, in bytes. */
  BODY_LIMIT: z.coerce.number().int().positive().default(50 * 1024 * 1024),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  bodyLimit: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${issues}`);
  }
  const { PORT, HOST, LOG_LEVEL, BODY_LIMIT } = parsed.data;
  return { port: PORT, host: HOST, logLevel: LOG_LEVEL, bodyLimit: BODY_LIMIT };
}
