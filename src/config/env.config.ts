import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toOptionalNumber = () =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : Number(v)), z.number()).optional();

const toOptionalString = () =>
  z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  TIMEZONE: z.string().default('Asia/Kolkata'),

  BOOKING_STORE: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  REDIS_PREFIX: z.string().min(1).default('slotfill'),

  OPENAI_API_KEY: toOptionalString(),
  OPENAI_MODEL: toOptionalString(),
  OPENAI_TEMPERATURE: toOptionalNumber(),

  FX_API_KEY: toOptionalString(),
  FX_API_URL: z.string().url().default('https://open.er-api.com/v6'),
  FX_DEFAULT_INR_RATE: toNumber(82),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
