import {LogLevelSchema, type LogLevel} from '@conference-api/logging';
import {z} from 'zod';

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive());

const nonNegativeNumberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().gte(0));

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const parseCorsAllowedOrigins = ({raw, envVarName}: {raw: string | undefined; envVarName: string}) => {
  if (!raw) {
    return [];
  }

  const origins = raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0);

  for (const origin of origins) {
    let parsed: URL;
    try {
      parsed = new URL(origin);
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`);
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`);
    }
  }

  return origins;
};

const parseCommaSeparatedKeys = (raw: string | undefined) => {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0);
};

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    CONFERENCE_API_HOST: z.string().default('0.0.0.0'),
    CONFERENCE_API_PORT: nonNegativeNumberFromEnv.pipe(z.number().lte(65_535)).default(9090),
    CONFERENCE_API_LOG_LEVEL: LogLevelSchema.optional(),
    CONFERENCE_API_LOG_REDACT_EXTRA_KEYS: optionalString,
    CONFERENCE_API_DB_DRIVER: z.enum(['sqlite']).default('sqlite'),
    CONFERENCE_API_DB_FILE: z.string().min(1).default('conference.db'),
    CONFERENCE_API_DB_LOG_QUERIES: booleanFromEnv.default(false),
    CONFERENCE_API_OIDC_ISSUER: z.string().url(),
    CONFERENCE_API_OIDC_CLIENT_ID: z.string().trim().min(1),
    CONFERENCE_API_OIDC_DISCOVERY_TIMEOUT_MS: numberFromEnv.default(5_000),
    CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS: nonNegativeNumberFromEnv.pipe(z.number().lte(300)).default(60),
    CONFERENCE_API_ROUTE_PROTECTION: z.enum(['legacy', 'strict']).default('legacy'),
    CONFERENCE_API_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    CONFERENCE_API_READ_TIMEOUT_MS: numberFromEnv.default(5_000),
    CONFERENCE_API_WRITE_TIMEOUT_MS: numberFromEnv.default(10_000),
    CONFERENCE_API_IDLE_TIMEOUT_MS: numberFromEnv.default(120_000),
    CONFERENCE_API_SHUTDOWN_GRACE_MS: numberFromEnv.default(30_000),
    CONFERENCE_API_CORS_ALLOWED_ORIGINS: optionalString
  })
  .strict();

export type RouteProtection = 'legacy' | 'strict';

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  host: string;
  port: number;
  maxBodyBytes: number;
  routeProtection: RouteProtection;
  corsAllowedOrigins: string[];
  database: {
    driver: 'sqlite';
    file: string;
    logQueries: boolean;
  };
  oidc: {
    issuer: string;
    clientId: string;
    discoveryTimeoutMs: number;
    clockToleranceSeconds: number;
  };
  timeouts: {
    readMs: number;
    writeMs: number;
    idleMs: number;
    shutdownGraceMs: number;
  };
  logging: {
    level: LogLevel;
    redactExtraKeys: string[];
  };
};

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  CONFERENCE_API_HOST: env.CONFERENCE_API_HOST,
  CONFERENCE_API_PORT: env.CONFERENCE_API_PORT,
  CONFERENCE_API_LOG_LEVEL: env.CONFERENCE_API_LOG_LEVEL,
  CONFERENCE_API_LOG_REDACT_EXTRA_KEYS: env.CONFERENCE_API_LOG_REDACT_EXTRA_KEYS,
  CONFERENCE_API_DB_DRIVER: env.CONFERENCE_API_DB_DRIVER,
  CONFERENCE_API_DB_FILE: env.CONFERENCE_API_DB_FILE,
  CONFERENCE_API_DB_LOG_QUERIES: env.CONFERENCE_API_DB_LOG_QUERIES,
  CONFERENCE_API_OIDC_ISSUER: env.CONFERENCE_API_OIDC_ISSUER,
  CONFERENCE_API_OIDC_CLIENT_ID: env.CONFERENCE_API_OIDC_CLIENT_ID,
  CONFERENCE_API_OIDC_DISCOVERY_TIMEOUT_MS: env.CONFERENCE_API_OIDC_DISCOVERY_TIMEOUT_MS,
  CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS: env.CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS,
  CONFERENCE_API_ROUTE_PROTECTION: env.CONFERENCE_API_ROUTE_PROTECTION,
  CONFERENCE_API_MAX_BODY_BYTES: env.CONFERENCE_API_MAX_BODY_BYTES,
  CONFERENCE_API_READ_TIMEOUT_MS: env.CONFERENCE_API_READ_TIMEOUT_MS,
  CONFERENCE_API_WRITE_TIMEOUT_MS: env.CONFERENCE_API_WRITE_TIMEOUT_MS,
  CONFERENCE_API_IDLE_TIMEOUT_MS: env.CONFERENCE_API_IDLE_TIMEOUT_MS,
  CONFERENCE_API_SHUTDOWN_GRACE_MS: env.CONFERENCE_API_SHUTDOWN_GRACE_MS,
  CONFERENCE_API_CORS_ALLOWED_ORIGINS: env.CONFERENCE_API_CORS_ALLOWED_ORIGINS
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env));

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.CONFERENCE_API_HOST,
    port: parsed.CONFERENCE_API_PORT,
    maxBodyBytes: parsed.CONFERENCE_API_MAX_BODY_BYTES,
    routeProtection: parsed.CONFERENCE_API_ROUTE_PROTECTION,
    corsAllowedOrigins: parseCorsAllowedOrigins({
      raw: parsed.CONFERENCE_API_CORS_ALLOWED_ORIGINS,
      envVarName: 'CONFERENCE_API_CORS_ALLOWED_ORIGINS'
    }),
    database: {
      driver: parsed.CONFERENCE_API_DB_DRIVER,
      file: parsed.CONFERENCE_API_DB_FILE,
      logQueries: parsed.CONFERENCE_API_DB_LOG_QUERIES
    },
    oidc: {
      issuer: parsed.CONFERENCE_API_OIDC_ISSUER,
      clientId: parsed.CONFERENCE_API_OIDC_CLIENT_ID,
      discoveryTimeoutMs: parsed.CONFERENCE_API_OIDC_DISCOVERY_TIMEOUT_MS,
      clockToleranceSeconds: parsed.CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS
    },
    timeouts: {
      readMs: parsed.CONFERENCE_API_READ_TIMEOUT_MS,
      writeMs: parsed.CONFERENCE_API_WRITE_TIMEOUT_MS,
      idleMs: parsed.CONFERENCE_API_IDLE_TIMEOUT_MS,
      shutdownGraceMs: parsed.CONFERENCE_API_SHUTDOWN_GRACE_MS
    },
    logging: {
      level: parsed.CONFERENCE_API_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseCommaSeparatedKeys(parsed.CONFERENCE_API_LOG_REDACT_EXTRA_KEYS)
    }
  };
};
