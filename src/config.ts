import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  HASH_TIME_COST: z.coerce.number().int().min(2).default(3),
  HASH_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
  HASH_PARALLELISM: z.coerce.number().int().min(1).default(4),
  ENABLE_RATE_LIMITING: booleanFlag,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).optional(),
  SLOW_REQUEST_THRESHOLD_MS: z.coerce.number().int().positive().default(1000),
});

export type JwtAlgorithm = z.infer<typeof envSchema>['JWT_ALGORITHM'];
export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  databaseUrl?: string;
  jwt: {
    secret: string;
    algorithm: JwtAlgorithm;
    ttlSeconds: number;
  };
  hashing: {
    timeCost: number;
    memoryCost: number;
    parallelism: number;
  };
  rateLimit: {
    enabled: boolean;
  };
  logging: {
    level: LogLevel;
    format: 'pretty' | 'json';
    slowRequestThresholdMs: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validate environment variables into the typed application config.
 * Throws ConfigError listing every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    databaseUrl: vars.DATABASE_URL,
    jwt: {
      secret: vars.JWT_SECRET,
      algorithm: vars.JWT_ALGORITHM,
      ttlSeconds: vars.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
    },
    hashing: {
      timeCost: vars.HASH_TIME_COST,
      memoryCost: vars.HASH_MEMORY_COST,
      parallelism: vars.HASH_PARALLELISM,
    },
    rateLimit: {
      enabled: vars.ENABLE_RATE_LIMITING,
    },
    logging: {
      level: vars.LOG_LEVEL,
      format: vars.LOG_FORMAT ?? (vars.NODE_ENV === 'development' ? 'pretty' : 'json'),
      slowRequestThresholdMs: vars.SLOW_REQUEST_THRESHOLD_MS,
    },
  };
}

/**
 * Load .env (if present) and parse process.env. Call once at startup.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
