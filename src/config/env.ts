import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

export const envSchema = z.object({
  // Server
  PORT: z
    .string()
    .default("8080")
    .transform(Number)
    .pipe(z.number().int().min(1, "PORT must be at least 1").max(65535, "PORT must be at most 65535")),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  // Checksum
  CHECK_MODE: z.enum(["passthrough", "strict"]).default("passthrough"),

  // Body reader
  BODY_LIMIT: z.string().min(1, "BODY_LIMIT cannot be empty").default("16kb"),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

// Derived config for convenience
export const config = {
  port: env.PORT,
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),

  checkMode: env.CHECK_MODE,
  bodyLimit: env.BODY_LIMIT,
} as const;
