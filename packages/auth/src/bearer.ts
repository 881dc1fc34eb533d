import {createRemoteJWKSet} from 'jose';

import {type OidcJwtKeyResolver, verifyAccessToken} from './accessToken';
import type {BearerTokenVerifier, BearerVerificationResult, OidcProviderMetadata} from './types';

const BEARER_CREDENTIALS = /^Bearer[ ]+(\S+)\s*$/iu;

export const parseBearerToken = (authorization: string | undefined) => {
  const header = authorization?.trim() ?? '';
  if (header.length === 0) {
    return {ok: false as const, reason: 'authorization_missing'};
  }

  const token = BEARER_CREDENTIALS.exec(header)?.[1];
  if (!token) {
    return {ok: false as const, reason: 'authorization_malformed'};
  }

  return {ok: true as const, token};
};

export type BearerTokenVerifierOptions = {
  metadata: OidcProviderMetadata;
  clientId: string;
  clockToleranceSeconds?: number;
  keyResolver?: OidcJwtKeyResolver;
  now?: () => Date;
};

export const createBearerTokenVerifier = ({
  metadata,
  clientId,
  clockToleranceSeconds = 60,
  keyResolver = createRemoteJWKSet(new URL(metadata.jwksUri)),
  now = () => new Date()
}: BearerTokenVerifierOptions): BearerTokenVerifier => {
  const algorithms = metadata.signingAlgorithms.length > 0 ? metadata.signingAlgorithms : undefined;

  const verifyAuthorizationHeader = async (
    authorization: string | undefined
  ): Promise<BearerVerificationResult> => {
    const bearer = parseBearerToken(authorization);
    if (!bearer.ok) {
      return bearer;
    }

    const verified = await verifyAccessToken(bearer.token, {
      keyResolver,
      issuer: metadata.issuer,
      audience: clientId,
      clockToleranceSeconds,
      now,
      ...(algorithms ? {algorithms} : {})
    });
    if (!verified.ok) {
      return verified;
    }

    const {payload} = verified;
    const subject = payload.sub?.trim();
    if (!subject) {
      return {ok: false, reason: 'oidc_subject_missing'};
    }

    return {
      ok: true,
      principal: {
        subject,
        issuer: payload.iss ?? metadata.issuer,
        audience: typeof payload.aud === 'string' ? [payload.aud] : (payload.aud ?? []),
        expiresAt: new Date((payload.exp ?? 0) * 1000),
        claims: payload
      }
    };
  };

  return {metadata, verifyAuthorizationHeader};
};
