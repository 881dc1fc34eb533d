import {z} from 'zod';

import {isUsableSigningAlgorithm, trimTrailingSlashes} from './accessToken';
import type {FetchLike, OidcProviderMetadata} from './types';

const DISCOVERY_PATH = '/.well-known/openid-configuration';

const DiscoveryDocumentSchema = z
  .object({
    issuer: z.string().url(),
    jwks_uri: z.string().url(),
    id_token_signing_alg_values_supported: z.array(z.string().min(1)).optional()
  })
  .loose();

export class OidcDiscoveryError extends Error {
  public readonly reason: string;

  public constructor(reason: string, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'OidcDiscoveryError';
    this.reason = reason;
  }
}

export const buildDiscoveryUrl = (issuer: string) => `${trimTrailingSlashes(issuer.trim())}${DISCOVERY_PATH}`;

const requestDiscoveryDocument = async ({
  url,
  fetchImpl,
  timeoutMs
}: {
  url: string;
  fetchImpl: FetchLike;
  timeoutMs: number;
}) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {signal: controller.signal, headers: {accept: 'application/json'}});
    if (!response.ok) {
      throw new OidcDiscoveryError('oidc_discovery_status', `Discovery request returned status ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new OidcDiscoveryError('oidc_discovery_invalid', 'Discovery document is not valid JSON', {cause: error});
    }
  } catch (error) {
    if (error instanceof OidcDiscoveryError) {
      throw error;
    }

    throw new OidcDiscoveryError('oidc_discovery_unavailable', 'Discovery request failed', {cause: error});
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Fetches `<issuer>/.well-known/openid-configuration` and checks that the provider describes itself
 * with the configured issuer. Symmetric and `none` algorithms advertised by the provider are dropped.
 */
export const discoverOidcProvider = async ({
  issuer,
  fetchImpl = fetch,
  timeoutMs = 5_000
}: {
  issuer: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}): Promise<OidcProviderMetadata> => {
  const document = await requestDiscoveryDocument({url: buildDiscoveryUrl(issuer), fetchImpl, timeoutMs});

  const parsed = DiscoveryDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new OidcDiscoveryError('oidc_discovery_invalid', 'Discovery document is missing issuer or jwks_uri');
  }

  if (trimTrailingSlashes(parsed.data.issuer) !== trimTrailingSlashes(issuer.trim())) {
    throw new OidcDiscoveryError('oidc_discovery_issuer_mismatch', 'Discovery document issuer does not match');
  }

  const signingAlgorithms = (parsed.data.id_token_signing_alg_values_supported ?? [])
    .map(algorithm => algorithm.trim())
    .filter(isUsableSigningAlgorithm);

  if (parsed.data.id_token_signing_alg_values_supported && signingAlgorithms.length === 0) {
    throw new OidcDiscoveryError('oidc_discovery_invalid', 'Discovery document advertises no usable signing algorithm');
  }

  return {
    issuer: parsed.data.issuer,
    jwksUri: parsed.data.jwks_uri,
    signingAlgorithms
  };
};
