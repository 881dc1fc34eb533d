import {IncomingMessage, type IncomingHttpHeaders} from 'node:http'
import {Socket} from 'node:net'

import type {BearerTokenVerifier, VerifiedPrincipal} from '@conference-api/auth'
import {createNoopLogger, getLogContext, runWithLogContext, type StructuredLogger} from '@conference-api/logging'
import {describe, expect, it, vi} from 'vitest'

import {logRouteProtectionMode, RequestAuthenticator} from '../auth'
import {AppError} from '../errors'
import {resolveMiddlewareSteps, runMiddlewareChain} from '../middleware'

const principal: VerifiedPrincipal = {
  subject: 'organizer-1',
  issuer: 'https://idp.example',
  audience: ['conference-api'],
  expiresAt: new Date('2026-03-01T12:10:00.000Z'),
  claims: {sub: 'organizer-1'}
}

const createVerifier = () => {
  const verifyAuthorizationHeader = vi.fn<BearerTokenVerifier['verifyAuthorizationHeader']>(async header => {
    if (!header) {
      return {ok: false, reason: 'authorization_missing'}
    }
    if (header === 'Bearer good-token') {
      return {ok: true, principal}
    }
    return {ok: false, reason: 'oidc_signature_invalid'}
  })

  const verifier: BearerTokenVerifier = {
    metadata: {issuer: 'https://idp.example', jwksUri: 'https://idp.example/jwks', signingAlgorithms: ['RS256']},
    verifyAuthorizationHeader
  }

  return {verifier, verifyAuthorizationHeader}
}

const createLoggerSpy = () => {
  const warn = vi.fn<StructuredLogger['warn']>()
  const logger = {...createNoopLogger(), warn} satisfies StructuredLogger
  return {logger, warn}
}

const createRequest = (headers: IncomingHttpHeaders) => {
  const request = new IncomingMessage(new Socket())
  request.headers = headers
  return request
}

const captureRejection = async (promise: Promise<unknown>) =>
  promise.then(
    () => {
      throw new Error('expected promise to reject')
    },
    (error: unknown) => error
  )

describe('resolveMiddlewareSteps', () => {
  it('maps chains to steps for each protection mode', () => {
    expect(resolveMiddlewareSteps({chain: 'open', routeProtection: 'strict'})).toEqual([])
    expect(resolveMiddlewareSteps({chain: 'bearer', routeProtection: 'legacy'})).toEqual(['bearerAuth'])
    expect(resolveMiddlewareSteps({chain: 'jsonBearer', routeProtection: 'legacy'})).toEqual([
      'jsonContentType',
      'bearerAuth'
    ])
    expect(resolveMiddlewareSteps({chain: 'bearerWhenStrict', routeProtection: 'legacy'})).toEqual([])
    expect(resolveMiddlewareSteps({chain: 'bearerWhenStrict', routeProtection: 'strict'})).toEqual(['bearerAuth'])
  })
})

describe('runMiddlewareChain', () => {
  it('checks the content type before the token', async () => {
    const {verifier, verifyAuthorizationHeader} = createVerifier()
    const authenticator = new RequestAuthenticator({verifier, logger: createNoopLogger()})

    const error = await captureRejection(
      runMiddlewareChain({
        chain: 'jsonBearer',
        routeProtection: 'legacy',
        request: createRequest({'content-type': 'text/plain'}),
        authenticator
      })
    )

    expect(error).toBeInstanceOf(AppError)
    if (error instanceof AppError) {
      expect(error.status).toBe(415)
      expect(error.code).toBe('content_type_invalid')
    }
    expect(verifyAuthorizationHeader).not.toHaveBeenCalled()
  })

  it('returns the principal when every step passes', async () => {
    const {verifier} = createVerifier()
    const authenticator = new RequestAuthenticator({verifier, logger: createNoopLogger()})

    const result = await runMiddlewareChain({
      chain: 'jsonBearer',
      routeProtection: 'legacy',
      request: createRequest({'content-type': 'application/json', authorization: 'Bearer good-token'}),
      authenticator
    })

    expect(result).toEqual({principal})
  })

  it('skips authentication on legacy open routes', async () => {
    const {verifier, verifyAuthorizationHeader} = createVerifier()
    const authenticator = new RequestAuthenticator({verifier, logger: createNoopLogger()})

    const result = await runMiddlewareChain({
      chain: 'bearerWhenStrict',
      routeProtection: 'legacy',
      request: createRequest({}),
      authenticator
    })

    expect(result).toEqual({})
    expect(verifyAuthorizationHeader).not.toHaveBeenCalled()
  })
})

describe('RequestAuthenticator', () => {
  it('maps a missing header to auth_missing and logs the reason', async () => {
    const {verifier} = createVerifier()
    const {logger, warn} = createLoggerSpy()
    const authenticator = new RequestAuthenticator({verifier, logger})

    const error = await captureRejection(authenticator.authenticate(undefined))

    expect(error).toBeInstanceOf(AppError)
    if (error instanceof AppError) {
      expect(error.status).toBe(401)
      expect(error.code).toBe('auth_missing')
      expect(error.message).toBe('Missing bearer token')
    }
    expect(warn).toHaveBeenCalledWith({
      event: 'auth.bearer.rejected',
      component: 'http.auth',
      message: 'Bearer token rejected',
      reason_code: 'authorization_missing'
    })
  })

  it('maps verification failures to auth_invalid', async () => {
    const {verifier} = createVerifier()
    const {logger, warn} = createLoggerSpy()
    const authenticator = new RequestAuthenticator({verifier, logger})

    const error = await captureRejection(authenticator.authenticate('Bearer forged-token'))

    expect(error).toBeInstanceOf(AppError)
    if (error instanceof AppError) {
      expect(error.code).toBe('auth_invalid')
      expect(error.message).toBe('Bearer token is invalid')
    }
    expect(warn.mock.calls[0]?.[0].reason_code).toBe('oidc_signature_invalid')
  })

  it('records the subject in the log context', async () => {
    const {verifier} = createVerifier()
    const authenticator = new RequestAuthenticator({verifier, logger: createNoopLogger()})

    const subject = await runWithLogContext({request_id: 'req-1'}, async () => {
      await authenticator.authenticate('Bearer good-token')
      return getLogContext()?.subject
    })

    expect(subject).toBe('organizer-1')
  })
})

describe('logRouteProtectionMode', () => {
  it('warns only in legacy mode', () => {
    const {logger, warn} = createLoggerSpy()

    logRouteProtectionMode({routeProtection: 'strict', logger})
    expect(warn).not.toHaveBeenCalled()

    logRouteProtectionMode({routeProtection: 'legacy', logger})
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0]?.[0].event).toBe('auth.route_protection.legacy')
  })
})
