import { z } from 'zod';

const csv = (value: string) =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

// Centralized environment contract; fail fast on missing/invalid values.
export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(4000),

  AWS_REGION: z.string().min(1).default('eu-west-1'),
  AWS_DEFAULT_REGION: z.string().min(1).optional(),
  DYNAMO_ENDPOINT: z.string().url().optional(),

  CUSTOMERS_TABLE_NAME: z.string().min(1, 'CUSTOMERS_TABLE_NAME is required'),
  CUSTOMER_EVENTS_TOPIC_ARN: z.string().min(1).optional(),

  PREMIUM_CUSTOMER_TYPES: z.string().default('VIP,PYME').transform(csv),
  CUSTOMER_DELETE_MODE: z.enum(['soft', 'hard']).default('soft'),

  ALLOWED_ORIGINS: z.string().optional(),
  BODY_LIMIT: z.string().default('2mb'),
  DISABLE_CSP: z.enum(['true', 'false']).optional(),

  THROTTLE_LIMIT: z.coerce.number().int().positive().default(100),
  THROTTLE_TTL_MS: z.coerce.number().int().positive().default(60_000),
});

export type AppEnv = z.infer<typeof envSchema>;

export const validateEnv = (env: Record<string, unknown>): AppEnv => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const messages = Object.entries(parsed.error.flatten().fieldErrors).map(
      ([key, errors]) => {
        const message =
          errors && errors.length > 0 ? errors.join(', ') : 'invalid';
        return `${key}: ${message}`;
      },
    );
    throw new Error(
      `Invalid environment configuration: ${messages.join(' | ')}`,
    );
  }

  const data = parsed.data;
  return {
    ...data,
    AWS_DEFAULT_REGION: data.AWS_DEFAULT_REGION ?? data.AWS_REGION,
  };
};
