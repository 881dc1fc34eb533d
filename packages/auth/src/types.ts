import type {JWTPayload} from 'jose';

export type OidcProviderMetadata = {
  issuer: string;
  jwksUri: string;
  signingAlgorithms: string[];
};

export type VerifiedPrincipal = {
  subject: string;
  issuer: string;
  audience: string[];
  expiresAt: Date;
  claims: JWTPayload;
};

export type BearerVerificationResult =
  | {ok: true; principal: VerifiedPrincipal}
  | {ok: false; reason: string};

export type BearerTokenVerifier = {
  metadata: OidcProviderMetadata;
  verifyAuthorizationHeader: (authorization: string | undefined) => Promise<BearerVerificationResult>;
};

export type FetchLike = (input: string, init?: {signal?: AbortSignal; headers?: Record<string, string>}) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;
