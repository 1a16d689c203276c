import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  PORT: z.string().default('5000'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ENCRYPTION_KEY: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'ENCRYPTION_KEY must be a 64-character hex string (32 bytes)'),
  GROQ_API_KEY: z.string().optional(),
  GROQ_MODEL: z.string().default('llama-3.1-8b-instant'),
  AI_CACHE_TTL: z.coerce.number().default(3600),
  AI_MAX_CACHE_SIZE: z.coerce.number().default(500),
  SESSION_IDLE_TTL: z.coerce.number().int().positive().default(3600),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  CONNECTIONS_FILE: z.string().default('connections.enc'),
  CACHE_DIR: z.string().default('.cache'),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(15000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
});

// Parse and export
const _env = envSchema.safeParse(process.env);

if (!_env.success) {
  console.error('❌ Invalid Environment Variables:', _env.error.format());
  process.exit(1); // Stop the server if config is wrong
}

export const env = _env.data;
export type Env = typeof env;
