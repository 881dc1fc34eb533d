import type {Server} from 'node:http';

import 'reflect-metadata';
import helmet from 'helmet';
import express from 'express';
import {NestFactory} from '@nestjs/core';
import {ExpressAdapter} from '@nestjs/platform-express';
import {
  createBearerTokenVerifier,
  discoverOidcProvider,
  type FetchLike,
  type OidcJwtKeyResolver
} from '@conference-api/auth';
import {createStructuredLogger, type StructuredLogWriter} from '@conference-api/logging';

import {logRouteProtectionMode, RequestAuthenticator} from './auth';
import type {ServiceConfig} from './config';
import {createProcessInfrastructure} from './infrastructure';
import {createHttpMetrics} from './metrics';
import {ConferenceApiNestModule} from './nest/conferenceApiNestModule';
import {expressErrorGuard, pathEncodingGuard} from './nest/requestGuards';
import {createServerRuntime} from './runtime';

export const SERVICE_NAME = 'conference-api';

export type ConferenceApiDependencies = {
  fetchImpl?: FetchLike;
  keyResolver?: OidcJwtKeyResolver;
  logWriter?: StructuredLogWriter;
};

export const createConferenceApiApp = async ({
  config,
  dependencies = {}
}: {
  config: ServiceConfig;
  dependencies?: ConferenceApiDependencies;
}) => {
  const logger = createStructuredLogger({
    service: SERVICE_NAME,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys,
    ...(dependencies.logWriter ? {writer: dependencies.logWriter} : {})
  });
  const infrastructure = createProcessInfrastructure({config, logger});

  try {
    const providerMetadata = await discoverOidcProvider({
      issuer: config.oidc.issuer,
      timeoutMs: config.oidc.discoveryTimeoutMs,
      ...(dependencies.fetchImpl ? {fetchImpl: dependencies.fetchImpl} : {})
    });
    logger.info({
      event: 'auth.oidc.discovered',
      component: 'http.auth',
      message: 'OpenID provider discovered',
      metadata: {
        issuer: providerMetadata.issuer,
        jwks_uri: providerMetadata.jwksUri
      }
    });

    const verifier = createBearerTokenVerifier({
      metadata: providerMetadata,
      clientId: config.oidc.clientId,
      clockToleranceSeconds: config.oidc.clockToleranceSeconds,
      ...(dependencies.keyResolver ? {keyResolver: dependencies.keyResolver} : {})
    });
    const authenticator = new RequestAuthenticator({verifier, logger});
    logRouteProtectionMode({routeProtection: config.routeProtection, logger});

    const metrics = createHttpMetrics({collectProcessMetrics: config.nodeEnv !== 'test'});

    const expressApp = express();
    expressApp.disable('x-powered-by');
    expressApp.use(
      helmet({
        contentSecurityPolicy: false
      })
    );
    expressApp.use(pathEncodingGuard);

    const nestApp = await NestFactory.create(
      ConferenceApiNestModule.register({
        config,
        repositories: infrastructure.repositories,
        authenticator,
        logger,
        metrics
      }),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn']
      }
    );

    if (config.corsAllowedOrigins.length > 0) {
      nestApp.enableCors({
        origin: config.corsAllowedOrigins
      });
    }

    await nestApp.init();
    expressApp.use(expressErrorGuard);

    const server: Server = nestApp.getHttpServer();
    const runtime = createServerRuntime({
      server,
      host: config.host,
      port: config.port,
      timeouts: config.timeouts,
      logger
    });

    const start = async () => {
      await runtime.start();
      logger.info({
        event: 'server.started',
        component: 'http.runtime',
        message: 'Conference API listening',
        metadata: {host: config.host, port: config.port}
      });
    };

    const stop = async () => {
      await runtime.stop();
      await nestApp.close();
      await infrastructure.close();
      logger.info({
        event: 'server.stopped',
        component: 'http.runtime',
        message: 'Conference API stopped'
      });
    };

    return {
      server,
      start,
      stop,
      logger,
      metrics,
      repositories: infrastructure.repositories
    };
  } catch (error) {
    await infrastructure.close();
    throw error;
  }
};

export type ConferenceApiApp = Awaited<ReturnType<typeof createConferenceApiApp>>;
