import type {IncomingMessage} from 'node:http'

import type {VerifiedPrincipal} from '@conference-api/auth'

import type {RequestAuthenticator} from './auth'
import type {RouteProtection} from './config'
import {requireJsonContentType} from './http'

export type MiddlewareChainName = 'open' | 'bearer' | 'jsonBearer' | 'bearerWhenStrict'

export type MiddlewareStep = 'jsonContentType' | 'bearerAuth'

export type MiddlewareResult = {
  principal?: VerifiedPrincipal
}

export const resolveMiddlewareSteps = ({
  chain,
  routeProtection
}: {
  chain: MiddlewareChainName
  routeProtection: RouteProtection
}): MiddlewareStep[] => {
  switch (chain) {
    case 'open':
      return []
    case 'bearer':
      return ['bearerAuth']
    case 'jsonBearer':
      return ['jsonContentType', 'bearerAuth']
    case 'bearerWhenStrict':
      return routeProtection === 'strict' ? ['bearerAuth'] : []
  }
}

/**
 * Applies the steps of a named chain in order. The first failing step throws and the handler is
 * never reached.
 */
export const runMiddlewareChain = async ({
  chain,
  routeProtection,
  request,
  authenticator
}: {
  chain: MiddlewareChainName
  routeProtection: RouteProtection
  request: IncomingMessage
  authenticator: RequestAuthenticator
}): Promise<MiddlewareResult> => {
  const result: MiddlewareResult = {}

  for (const step of resolveMiddlewareSteps({chain, routeProtection})) {
    if (step === 'jsonContentType') {
      requireJsonContentType(request)
    } else {
      result.principal = await authenticator.authenticate(request.headers.authorization)
    }
  }

  return result
}
