import {describe, expect, it} from 'vitest';

import {loadConfig} from '../config';

const baseEnv = {
  NODE_ENV: 'test',
  CONFERENCE_API_OIDC_ISSUER: 'https://idp.example/realms/conference',
  CONFERENCE_API_OIDC_CLIENT_ID: 'conference-api'
} as const;

describe('config', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig({...baseEnv});

    expect(config.nodeEnv).toBe('test');
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(9090);
    expect(config.routeProtection).toBe('legacy');
    expect(config.corsAllowedOrigins).toEqual([]);
    expect(config.database).toEqual({
      driver: 'sqlite',
      file: 'conference.db',
      logQueries: false
    });
    expect(config.oidc).toEqual({
      issuer: 'https://idp.example/realms/conference',
      clientId: 'conference-api',
      discoveryTimeoutMs: 5_000,
      clockToleranceSeconds: 60
    });
    expect(config.timeouts).toEqual({
      readMs: 5_000,
      writeMs: 10_000,
      idleMs: 120_000,
      shutdownGraceMs: 30_000
    });
    expect(config.logging).toEqual({
      level: 'silent',
      redactExtraKeys: []
    });
  });

  it('reads explicit overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      NODE_ENV: 'production',
      CONFERENCE_API_HOST: '127.0.0.1',
      CONFERENCE_API_PORT: '8081',
      CONFERENCE_API_LOG_LEVEL: 'debug',
      CONFERENCE_API_LOG_REDACT_EXTRA_KEYS: 'x-api-key, session ',
      CONFERENCE_API_DB_FILE: '/var/lib/conference/data.db',
      CONFERENCE_API_DB_LOG_QUERIES: 'true',
      CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS: '0',
      CONFERENCE_API_ROUTE_PROTECTION: 'strict',
      CONFERENCE_API_MAX_BODY_BYTES: '2048',
      CONFERENCE_API_CORS_ALLOWED_ORIGINS: 'http://localhost:5173, https://schedule.example'
    });

    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(8081);
    expect(config.maxBodyBytes).toBe(2048);
    expect(config.routeProtection).toBe('strict');
    expect(config.database.file).toBe('/var/lib/conference/data.db');
    expect(config.database.logQueries).toBe(true);
    expect(config.oidc.clockToleranceSeconds).toBe(0);
    expect(config.corsAllowedOrigins).toEqual(['http://localhost:5173', 'https://schedule.example']);
    expect(config.logging).toEqual({
      level: 'debug',
      redactExtraKeys: ['x-api-key', 'session']
    });
  });

  it('defaults the log level to info outside tests', () => {
    expect(loadConfig({...baseEnv, NODE_ENV: 'development'}).logging.level).toBe('info');
  });

  it('requires the oidc issuer and client id', () => {
    expect(() => loadConfig({NODE_ENV: 'test', CONFERENCE_API_OIDC_CLIENT_ID: 'conference-api'})).toThrow();
    expect(() =>
      loadConfig({NODE_ENV: 'test', CONFERENCE_API_OIDC_ISSUER: 'https://idp.example'})
    ).toThrow();
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_OIDC_ISSUER: 'not a url'})).toThrow();
  });

  it('rejects out of range values', () => {
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_PORT: '70000'})).toThrow();
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_OIDC_CLOCK_TOLERANCE_SECONDS: '301'})).toThrow();
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_ROUTE_PROTECTION: 'open'})).toThrow();
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_DB_DRIVER: 'postgres'})).toThrow();
  });

  it('rejects invalid cors origins', () => {
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_CORS_ALLOWED_ORIGINS: 'ftp://files.example'})).toThrow(
      'CONFERENCE_API_CORS_ALLOWED_ORIGINS contains an unsupported origin protocol: ftp://files.example'
    );
    expect(() => loadConfig({...baseEnv, CONFERENCE_API_CORS_ALLOWED_ORIGINS: 'not-a-url'})).toThrow(
      'CONFERENCE_API_CORS_ALLOWED_ORIGINS contains an invalid URL origin: not-a-url'
    );
  });
});
