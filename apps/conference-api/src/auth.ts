import type {BearerTokenVerifier, VerifiedPrincipal} from '@conference-api/auth';
import {setLogContextFields, type StructuredLogger} from '@conference-api/logging';

import type {RouteProtection} from './config';
import {unauthorized} from './errors';

export class RequestAuthenticator {
  private readonly verifier: BearerTokenVerifier;
  private readonly logger: StructuredLogger;

  public constructor({verifier, logger}: {verifier: BearerTokenVerifier; logger: StructuredLogger}) {
    this.verifier = verifier;
    this.logger = logger;
  }

  /**
   * Resolves the principal behind the request's bearer token. The rejection reason is logged; the
   * client only learns that the token was missing or invalid.
   */
  public async authenticate(authorizationHeader: string | undefined): Promise<VerifiedPrincipal> {
    const result = await this.verifier.verifyAuthorizationHeader(authorizationHeader);
    if (!result.ok) {
      this.logger.warn({
        event: 'auth.bearer.rejected',
        component: 'http.auth',
        message: 'Bearer token rejected',
        reason_code: result.reason
      });

      if (result.reason === 'authorization_missing' || result.reason === 'authorization_malformed') {
        throw unauthorized('auth_missing', 'Missing bearer token');
      }

      throw unauthorized('auth_invalid', 'Bearer token is invalid');
    }

    setLogContextFields({subject: result.principal.subject});
    this.logger.debug({
      event: 'auth.bearer.verified',
      component: 'http.auth',
      message: 'Bearer token verified'
    });

    return result.principal;
  }
}

export const logRouteProtectionMode = ({
  routeProtection,
  logger
}: {
  routeProtection: RouteProtection;
  logger: StructuredLogger;
}) => {
  if (routeProtection === 'strict') {
    return;
  }

  logger.warn({
    event: 'auth.route_protection.legacy',
    component: 'http.auth',
    message: 'Get-by-id and delete routes accept requests without a bearer token',
    metadata: {route_protection: routeProtection}
  });
};
