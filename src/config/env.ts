import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const clock = z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:mm');

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  DATABASE_URL: z.string().min(1),
  SENTRY_DSN: optionalString,
  BUSINESS_TIMEZONE: z.string().min(1).default('UTC'),
  BUSINESS_OPEN: clock.default('09:00'),
  BUSINESS_CLOSE: clock.default('17:00'),
  BUSINESS_DAYS: z.string().default('monday,tuesday,wednesday,thursday,friday'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
