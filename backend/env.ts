import 'dotenv/config'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3001'),

  LOG_FILE: z.string().default('logs/backend.log'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  DATABASE_URL: z.string().min(1),

  JWT_SECRET: z.string().min(16),
  ACCESS_TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
  REMEMBER_ME_TTL_DAYS: z.coerce.number().int().positive().default(14),
  EMAIL_VERIFICATION_TTL_HOURS: z.coerce.number().int().positive().default(24),
  PASSWORD_RESET_TTL_HOURS: z.coerce.number().int().positive().default(24),
  LOGIN_FAILURE_LIMIT: z.coerce.number().int().positive().default(5),
  LOGIN_LOCKOUT_MINUTES: z.coerce.number().int().positive().default(30),

  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanFlag.default('false'),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  DEFAULT_FROM_EMAIL: z.string().default('noreply@example.com'),

  MEDIA_ROOT: z.string().default('media'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),

  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default('gpt-4.1-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(3000),
  LLM_MAX_COMPLETION_TOKENS: z.coerce.number().int().positive().default(1000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(800),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RAG_TOP_K: z.coerce.number().int().positive().max(50).default(10),
  RAG_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(0.2),

  CHAT_HISTORY_LIMIT: z.coerce.number().int().positive().max(100).default(20),
  MAX_MESSAGE_CHARS: z.coerce.number().int().positive().max(10000).default(1000),

  RESPONSE_CACHE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
  RESPONSE_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500)
})

export type Env = z.infer<typeof envSchema>

export const env: Env = envSchema.parse(process.env)

export const isProduction = env.NODE_ENV === 'production'
