export {
  ASYMMETRIC_SIGNING_ALGORITHMS,
  isUsableSigningAlgorithm,
  KeySetUnavailableError,
  toRejectionReason,
  verifyAccessToken,
  type AccessTokenRejection,
  type AccessTokenVerification,
  type AccessTokenVerificationOptions,
  type OidcJwtKeyResolver
} from './accessToken';
export {createBearerTokenVerifier, parseBearerToken, type BearerTokenVerifierOptions} from './bearer';
export {buildDiscoveryUrl, discoverOidcProvider, OidcDiscoveryError} from './discovery';
export type {
  BearerTokenVerifier,
  BearerVerificationResult,
  FetchLike,
  OidcProviderMetadata,
  VerifiedPrincipal
} from './types';
