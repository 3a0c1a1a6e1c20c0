import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().default("3001"),

  // Optional: without it the server keeps videos and job history in memory
  DATABASE_URL: z.string().min(1).optional(),

  // Shared with the auth service that issues access tokens. Tokens are only
  // verified here, never issued.
  JWT_SECRET: z
    .string({
      required_error:
        "JWT_SECRET is required. It must match the secret the auth service signs tokens with.",
    })
    .min(32, "JWT_SECRET must be at least 32 characters"),

  // CORS allowed origins (comma-separated)
  ALLOWED_ORIGINS: z.string().optional(),

  // Video pipeline
  VIDEOS_DIR: z.string().min(1).default("videos"),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  FFMPEG_CRF: z.coerce.number().int().min(0).max(51).default(30),
  // 0 disables the timeout: a hung ffmpeg only holds its own child process
  TRANSCODE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(200 * 1024 * 1024),

  // How often each live connection scans for completed jobs
  NOTIFICATION_TICK_MS: z.coerce.number().int().positive().default(5000),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug"]).optional(),

  // Database pool tuning (all optional with safe defaults)
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  // Unit tests run without secrets or a database
  const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
  if (isTest) {
    return envSchema.parse({
      NODE_ENV: "test",
      JWT_SECRET: "test-jwt-secret-at-least-32-characters",
    });
  }

  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missing = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Environment validation failed:\n${missing}`);
    }
    throw error;
  }
}

export const env = validateEnv();
