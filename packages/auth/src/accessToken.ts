import {errors, jwtVerify, type JWTPayload, type JWTVerifyGetKey} from 'jose';

export type OidcJwtKeyResolver = JWTVerifyGetKey;

export const ASYMMETRIC_SIGNING_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
  'EdDSA'
] as const;

const ACCESS_TOKEN_MAX_LENGTH = 16_384;
const CLOCK_TOLERANCE_LIMIT_SECONDS = 300;

export type AccessTokenRejection =
  | 'oidc_token_invalid'
  | 'oidc_token_expired'
  | 'oidc_token_claims_invalid'
  | 'oidc_alg_not_allowed'
  | 'oidc_signature_invalid'
  | 'oidc_jwks_unavailable'
  | 'oidc_issuer_mismatch'
  | 'oidc_audience_mismatch'
  | 'oidc_verifier_config_invalid';

export type AccessTokenVerification =
  | {ok: true; payload: JWTPayload; algorithm: string}
  | {ok: false; reason: AccessTokenRejection};

export type AccessTokenVerificationOptions = {
  keyResolver: OidcJwtKeyResolver;
  issuer: string;
  audience: string;
  algorithms?: readonly string[];
  clockToleranceSeconds?: number;
  now?: () => Date;
};

export const trimTrailingSlashes = (value: string) => value.replace(/\/+$/u, '');

/** `none` and the HMAC family cannot be verified against a provider's published keys. */
export const isUsableSigningAlgorithm = (algorithm: string) => {
  const normalized = algorithm.trim().toUpperCase();
  return normalized.length > 0 && normalized !== 'NONE' && !normalized.startsWith('HS');
};

// Providers differ on whether `iss` carries a trailing slash.
const acceptedIssuers = (issuer: string) => {
  const base = trimTrailingSlashes(issuer.trim());
  return [base, `${base}/`];
};

const resolveAlgorithms = (algorithms: readonly string[] | undefined) => {
  if (algorithms === undefined) {
    return [...ASYMMETRIC_SIGNING_ALGORITHMS];
  }

  const usable = algorithms.map(algorithm => algorithm.trim()).filter(isUsableSigningAlgorithm);
  return usable.length === algorithms.length && usable.length > 0 ? usable : null;
};

/** Raised when the key resolver fails for a reason outside JOSE, such as an unreachable JWKS endpoint. */
export class KeySetUnavailableError extends Error {
  public constructor(options?: {cause?: unknown}) {
    super('Signing keys could not be resolved', options);
    this.name = 'KeySetUnavailableError';
  }
}

const guardKeyResolver =
  (keyResolver: OidcJwtKeyResolver): OidcJwtKeyResolver =>
  async (protectedHeader, token) => {
    try {
      return await keyResolver(protectedHeader, token);
    } catch (error) {
      if (error instanceof errors.JOSEError) {
        throw error;
      }

      throw new KeySetUnavailableError({cause: error});
    }
  };

export const toRejectionReason = (error: unknown): AccessTokenRejection => {
  if (error instanceof errors.JWTExpired) {
    return 'oidc_token_expired';
  }

  if (error instanceof errors.JWTClaimValidationFailed) {
    switch (error.claim) {
      case 'iss':
        return 'oidc_issuer_mismatch';
      case 'aud':
        return 'oidc_audience_mismatch';
      default:
        return 'oidc_token_claims_invalid';
    }
  }

  if (error instanceof errors.JOSEAlgNotAllowed) {
    return 'oidc_alg_not_allowed';
  }

  if (
    error instanceof errors.JWSSignatureVerificationFailed ||
    error instanceof errors.JWKSNoMatchingKey ||
    error instanceof errors.JWKSMultipleMatchingKeys
  ) {
    return 'oidc_signature_invalid';
  }

  if (
    error instanceof KeySetUnavailableError ||
    error instanceof errors.JWKSTimeout ||
    error instanceof errors.JWKSInvalid
  ) {
    return 'oidc_jwks_unavailable';
  }

  return 'oidc_token_invalid';
};

/**
 * Verifies an access token issued by the configured provider: signature against the provider's
 * keys, `exp` (required), `iss` and `aud`. A rejected token yields a reason code that is safe to
 * log but is not meant for clients.
 */
export const verifyAccessToken = async (
  token: string,
  {keyResolver, issuer, audience, algorithms, clockToleranceSeconds = 60, now = () => new Date()}: AccessTokenVerificationOptions
): Promise<AccessTokenVerification> => {
  if (
    !Number.isInteger(clockToleranceSeconds) ||
    clockToleranceSeconds < 0 ||
    clockToleranceSeconds > CLOCK_TOLERANCE_LIMIT_SECONDS
  ) {
    return {ok: false, reason: 'oidc_verifier_config_invalid'};
  }

  const allowedAlgorithms = resolveAlgorithms(algorithms);
  if (!allowedAlgorithms || issuer.trim().length === 0 || audience.trim().length === 0) {
    return {ok: false, reason: 'oidc_verifier_config_invalid'};
  }

  const compact = token.trim();
  if (compact.length === 0 || compact.length > ACCESS_TOKEN_MAX_LENGTH) {
    return {ok: false, reason: 'oidc_token_invalid'};
  }

  try {
    const {payload, protectedHeader} = await jwtVerify(compact, guardKeyResolver(keyResolver), {
      issuer: acceptedIssuers(issuer),
      audience: audience.trim(),
      algorithms: allowedAlgorithms,
      requiredClaims: ['exp', 'iss', 'aud'],
      clockTolerance: clockToleranceSeconds,
      currentDate: now()
    });

    return {ok: true, payload, algorithm: protectedHeader.alg};
  } catch (error) {
    return {ok: false, reason: toRejectionReason(error)};
  }
};
