import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).optional(),
  SECRET_KEY: z.string().min(1).default('dev-secret-key-change-in-production'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash-exp'),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  STATIC_DIR: z.string().min(1).default('public'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

/**
 * Parse and freeze the process configuration.
 * Throws a ZodError when a variable is malformed.
 */
export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  return Object.freeze(envSchema.parse(source));
}

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('❌ Invalid environment configuration', parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}

export const config: AppConfig = Object.freeze(parsedEnv.data);
