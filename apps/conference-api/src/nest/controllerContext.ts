import {randomUUID} from 'node:crypto'

import {Inject, Injectable} from '@nestjs/common'
import type {Request, Response} from 'express'
import type {VerifiedPrincipal} from '@conference-api/auth'
import {DbRepositoryError, type DbRepositories} from '@conference-api/db'
import {runWithLogContext, type StructuredLogger} from '@conference-api/logging'

import type {RequestAuthenticator} from '../auth'
import type {ServiceConfig} from '../config'
import {conflict, internal, isAppError, notFound, unprocessable, type AppError} from '../errors'
import {extractCorrelationId, sendError} from '../http'
import type {HttpMetrics} from '../metrics'
import {runMiddlewareChain, type MiddlewareChainName} from '../middleware'
import {
  CONFERENCE_API_AUTHENTICATOR,
  CONFERENCE_API_CONFIG,
  CONFERENCE_API_LOGGER,
  CONFERENCE_API_METRICS,
  CONFERENCE_API_REPOSITORIES
} from './tokens'

const COMPONENT = 'http.server'

export type RequestHandlerContext = {
  correlationId: string
  principal?: VerifiedPrincipal
}

export const toAppError = (error: unknown): AppError | null => {
  if (isAppError(error)) {
    return error
  }

  if (!(error instanceof DbRepositoryError)) {
    return null
  }

  switch (error.code) {
    case 'not_found':
      return notFound('not_found', error.message)
    case 'validation_failed':
      return unprocessable('validation_failed', 'Request body failed validation', error.violations)
    case 'conflict':
      return conflict('conflict', error.message)
    case 'unexpected_error':
      return null
  }
}

@Injectable()
export class ConferenceApiControllerContext {
  public constructor(
    @Inject(CONFERENCE_API_CONFIG) public readonly config: ServiceConfig,
    @Inject(CONFERENCE_API_REPOSITORIES) public readonly repositories: DbRepositories,
    @Inject(CONFERENCE_API_AUTHENTICATOR) private readonly authenticator: RequestAuthenticator,
    @Inject(CONFERENCE_API_LOGGER) private readonly logger: StructuredLogger,
    @Inject(CONFERENCE_API_METRICS) public readonly metrics: HttpMetrics
  ) {}

  /**
   * Runs `handler` inside a request scope: correlation id and log context, the route's middleware
   * chain, translation of thrown errors into error responses, and request logging and metrics.
   * `route` is the route template and is what logs and metrics are labelled with.
   */
  public async handleRequest({
    request,
    response,
    route,
    chain,
    handler
  }: {
    request: Request
    response: Response
    route: string
    chain: MiddlewareChainName
    handler: (context: RequestHandlerContext) => void | Promise<void>
  }): Promise<void> {
    const correlationId = extractCorrelationId(request)
    const method = request.method
    const startedAt = performance.now()

    await runWithLogContext({correlation_id: correlationId, request_id: randomUUID(), method, route}, async () => {
      this.logger.debug({
        event: 'request.received',
        component: COMPONENT,
        message: 'Request received',
        metadata: {path: request.path}
      })

      let reasonCode: string | undefined
      try {
        const {principal} = await runMiddlewareChain({
          chain,
          routeProtection: this.config.routeProtection,
          request,
          authenticator: this.authenticator
        })
        await handler(principal ? {correlationId, principal} : {correlationId})
      } catch (error) {
        reasonCode = this.respondWithError({response, correlationId, error})
      } finally {
        this.recordCompletion({
          method,
          route,
          statusCode: response.statusCode,
          durationMs: Math.round(performance.now() - startedAt),
          reasonCode
        })
      }
    })
  }

  private respondWithError({
    response,
    correlationId,
    error
  }: {
    response: Response
    correlationId: string
    error: unknown
  }): string {
    const known = toAppError(error)
    const appError = known ?? internal('internal_error', 'Unexpected internal error')
    if (known) {
      this.logger.debug({
        event: 'request.rejected',
        component: COMPONENT,
        message: appError.message,
        reason_code: appError.code
      })
    } else {
      this.logger.error({
        event: 'request.failed',
        component: COMPONENT,
        message: appError.message,
        reason_code: appError.code,
        metadata: {error}
      })
    }

    sendError({
      response,
      status: appError.status,
      error: appError.code,
      message: appError.message,
      correlationId,
      ...(appError.violations ? {violations: appError.violations} : {})
    })
    return appError.code
  }

  private recordCompletion({
    method,
    route,
    statusCode,
    durationMs,
    reasonCode
  }: {
    method: string
    route: string
    statusCode: number
    durationMs: number
    reasonCode: string | undefined
  }) {
    this.metrics.observeRequest({method, route, statusCode, durationMs})

    const entry = {
      event: 'request.completed',
      component: COMPONENT,
      message: 'Request completed',
      status_code: statusCode,
      duration_ms: durationMs,
      ...(reasonCode ? {reason_code: reasonCode} : {})
    }
    if (statusCode >= 500) {
      this.logger.error(entry)
    } else if (statusCode >= 400) {
      this.logger.warn(entry)
    } else {
      this.logger.info(entry)
    }
  }
}
