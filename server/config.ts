import { z } from "zod";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromEnv(5000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_SIZE: intFromEnv(10),
  SESSION_SECRET: z.string().min(16).optional(),

  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  RECOGNITION_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  RECOGNITION_TIMEOUT_MS: intFromEnv(20000),
  RECOGNITION_MAX_ATTEMPTS: intFromEnv(3),
  RECOGNITION_RETRY_DELAY_MS: intFromEnv(1000),

  MAX_UPLOAD_BYTES: intFromEnv(10 * 1024 * 1024),
  MAX_IMAGE_EDGE: intFromEnv(2048),
  PDF_RENDER_SCALE: z.coerce.number().positive().max(6).default(2),
  LOCAL_STORAGE_PATH: z.string().min(1).default('./data/uploads'),

  DEFAULT_SUBMISSION_DEADLINE: z.string().datetime({ offset: true }).optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}

export const config = loadConfig();
