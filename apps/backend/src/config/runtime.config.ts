import { ConfigType, registerAs } from '@nestjs/config';
import { AppEnv, validateEnv } from './env.schema';

export const loadValidatedEnv = (
  env: Record<string, unknown> = process.env,
): AppEnv => validateEnv(env);

export const runtimeConfig = registerAs('runtime', () => {
  const env = loadValidatedEnv(process.env);

  return {
    env,
    throttle: {
      limit: env.THROTTLE_LIMIT,
      ttl: env.THROTTLE_TTL_MS,
    },
  };
});

export type RuntimeConfig = ConfigType<typeof runtimeConfig>;
