import dotenv from "dotenv";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8181),
  HOST: z.string().default("0.0.0.0"),
  STATIC_DIR: z.string().default("web"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SIMULATE_INTERVAL_MS: z.coerce.number().int().positive().default(1000)
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(
      `Invalid environment configuration:\n${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("\n")}`
    );
  }

  return parsed.data;
}

/** Reads `.env` into `process.env`, then validates it. */
export function loadConfigFromEnvironment(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
