import "dotenv/config";
import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((value) => ["true", "1", "yes", "on"].includes(value));

// An empty `KEY=` line in .env counts as unset.
const blankAsUnset = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(35816)),
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT_ANNOUNCE_PREFIX: z.string().min(1).default("SERVER_PORT"),
  SERVICE_NAME: z.string().min(1).default("ai-server"),
  SERVICE_VERSION: z.string().min(1).default("1.0.0"),
  BACKEND_BASE_URL: z.string().url().default("http://localhost:39722"),
  HTTP_RETRIES: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(1)),
  BACKEND_HEALTH_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(5_000)),
  ENABLE_CONNECTION_MONITORING: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(flag)
    .default("false"),
  MONITORING_INTERVAL: z.preprocess(blankAsUnset, z.coerce.number().positive().default(10)),
  SHUTDOWN_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(5_000))
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}

export const Env: EnvConfig = loadEnv();
