/**
 * Centralized Configuration Loader with Zod Validation
 * Provides type-safe configuration loading with runtime validation
 */

import { z } from 'zod';

const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  SERVICE_NAME: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),
});

// Accept a direct URL (POSTGRES_URL / POSTGRES_URI / DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB
const PostgresConfigSchema = z.object({
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_DB: z.string().optional(),
  POSTGRES_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  POSTGRES_URL: z.string().optional(),
  POSTGRES_URI: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  DB_STATEMENT_TIMEOUT: z.coerce.number().int().positive().default(30000),
});

// Bounds for starting and stopping the database loop
const DatabaseLoopConfigSchema = z.object({
  DB_LOOP_STARTUP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DB_LOOP_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
});

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

// '3600', '15m', '12h', '1d' -> seconds
const DurationSecondsSchema = z
  .string()
  .regex(/^\d+[smhd]?$/, 'Expected a duration such as 3600, 15m, 12h or 1d')
  .transform((value) => {
    const unit = value.slice(-1);
    const factor = DURATION_UNITS[unit];
    return factor ? parseInt(value.slice(0, -1), 10) * factor : parseInt(value, 10);
  });

const JWTConfigSchema = z.object({
  JWT_SECRET: z.string().min(8).optional(),
  JWT_EXPIRES_IN: DurationSecondsSchema.default('1d'),
});

const ServiceConfigSchema = BaseConfigSchema.merge(PostgresConfigSchema)
  .merge(DatabaseLoopConfigSchema)
  .merge(JWTConfigSchema);

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type DatabaseLoopConfig = z.infer<typeof DatabaseLoopConfigSchema>;
export type JWTConfig = z.infer<typeof JWTConfigSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export interface ServiceConfigOptions {
  requirePostgres?: boolean;
  requireJWT?: boolean;
}

/**
 * Load and validate configuration for a service
 */
export function loadServiceConfig(
  serviceName: string,
  options: ServiceConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  const problems: string[] = [];

  const parsed = ServiceConfigSchema.safeParse({
    ...env,
    SERVICE_NAME: serviceName,
    PORT: env.PORT || env[`${serviceName.toUpperCase().replace(/-/g, '_')}_PORT`],
  });

  if (!parsed.success) {
    problems.push(...parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`));
  } else {
    const config = parsed.data;
    if (options.requirePostgres) {
      const hasUrl = !!(config.POSTGRES_URL || config.POSTGRES_URI || config.DATABASE_URL);
      const hasIndividual = !!(config.POSTGRES_USER && config.POSTGRES_PASSWORD && config.POSTGRES_DB);
      if (!hasUrl && !hasIndividual) {
        problems.push(
          'Postgres requires either POSTGRES_URL (or POSTGRES_URI or DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB'
        );
      }
    }
    if (options.requireJWT && !config.JWT_SECRET) {
      problems.push('JWT_SECRET: Required');
    }
    if (problems.length === 0) {
      return config;
    }
  }

  throw new Error(`Configuration validation failed for ${serviceName}:\n${problems.join('\n')}`);
}
