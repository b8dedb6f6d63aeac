import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  DATABASE_URL: z.string().min(1).optional(),
  STORAGE: z.enum(['pg', 'memory']).default('pg'),
  CORS_ORIGIN: z.string().default('*'),
  HISTORY_MAX_POINTS_PER_DAY: z.coerce.number().int().min(2).default(1000),
  ROUTE_DEVIATION_THRESHOLD_KM: z.coerce.number().positive().default(5),
  STOP_APPROACH_RADIUS_KM: z.coerce.number().positive().default(2),
  SAGA_STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GEOCODER_BASE_URL: z.string().url().optional(),
  APPLY_SCHEMA_ON_START: flag.default('false'),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  storage: 'pg' | 'memory';
  corsOrigin: string;
  tracking: {
    maxPointsPerDay: number;
    routeDeviationThresholdKm: number;
    stopApproachRadiusKm: number;
  };
  sagaStepTimeoutMs: number;
  /** Geocoding is disabled when unset. */
  geocoderBaseUrl?: string;
  applySchemaOnStart: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`),
    );
  }
  const e = parsed.data;
  if (e.STORAGE === 'pg' && !e.DATABASE_URL) {
    throw new ConfigError(['DATABASE_URL: required when STORAGE=pg']);
  }

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    storage: e.STORAGE,
    corsOrigin: e.CORS_ORIGIN,
    tracking: {
      maxPointsPerDay: e.HISTORY_MAX_POINTS_PER_DAY,
      routeDeviationThresholdKm: e.ROUTE_DEVIATION_THRESHOLD_KM,
      stopApproachRadiusKm: e.STOP_APPROACH_RADIUS_KM,
    },
    sagaStepTimeoutMs: e.SAGA_STEP_TIMEOUT_MS,
    geocoderBaseUrl: e.GEOCODER_BASE_URL,
    applySchemaOnStart: e.APPLY_SCHEMA_ON_START,
  };
}
