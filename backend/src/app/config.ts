/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

import { TOKEN_DEFAULTS } from '../modules/auth/auth.constants';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('squadlink-backend'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Session tokens (HS256)
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_ACCESS_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(60)
    .default(TOKEN_DEFAULTS.accessTtlSeconds),
  JWT_REFRESH_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(60)
    .default(TOKEN_DEFAULTS.refreshTtlSeconds),

  // Cable (WebSocket)
  CABLE_PATH: z.string().startsWith('/').default('/cable'),
  CABLE_MAX_PAYLOAD_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .default(16 * 1024),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };

  cable: {
    path: string;
    maxPayloadBytes: number;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      secret: parsed.JWT_SECRET,
      accessTtlSeconds: parsed.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: parsed.JWT_REFRESH_TTL_SECONDS,
    },

    cable: {
      path: parsed.CABLE_PATH,
      maxPayloadBytes: parsed.CABLE_MAX_PAYLOAD_BYTES,
    },
  };
}
