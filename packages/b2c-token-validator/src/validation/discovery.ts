import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';
import type { DiscoveryError, IssuerMetadata, TenantConfig } from '../types.js';
import type { B2cDiscoveryDocument } from './types.js';
import { createDiscoveryError, createDiscoveryHttpError } from './errors.js';

/** Default B2C login domain; the tenant name is prepended */
const B2C_LOGIN_DOMAIN = 'b2clogin.com';

/** Directory domain of every B2C tenant */
const B2C_DIRECTORY_DOMAIN = 'onmicrosoft.com';

/**
 * Builds the OpenID discovery URL for a tenant's policy.
 *
 * @param tenantName - B2C tenant name
 * @param policyName - Policy / user-flow name
 * @param authorityHost - Custom domain, with or without scheme (default: {tenant}.b2clogin.com)
 * @returns The well-known configuration URL
 *
 * @example
 * ```typescript
 * buildDiscoveryUrl('contoso', 'B2C_1_signin');
 * // 'https://contoso.b2clogin.com/contoso.onmicrosoft.com/B2C_1_signin/v2.0/.well-known/openid-configuration'
 *
 * buildDiscoveryUrl('contoso', 'B2C_1_signin', 'login.contoso.com/');
 * // 'https://login.contoso.com/contoso.onmicrosoft.com/B2C_1_signin/v2.0/.well-known/openid-configuration'
 * ```
 */
export const buildDiscoveryUrl = (
  tenantName: string,
  policyName: string,
  authorityHost?: string
): string => {
  const host = authorityHost ?? `${tenantName}.${B2C_LOGIN_DOMAIN}`;
  const withScheme = /^https?:\/\//i.test(host) ? host : `https://${host}`;
  const baseUrl = withScheme.replace(/\/+$/, '');
  const tenant = encodeURIComponent(tenantName);
  const policy = encodeURIComponent(policyName);

  return `${baseUrl}/${tenant}.${B2C_DIRECTORY_DOMAIN}/${policy}/v2.0/.well-known/openid-configuration`;
};

/**
 * Validates that a discovery document has the fields the validator needs.
 *
 * @param doc - The parsed response body
 * @returns Result with validated document or error
 */
export const validateDiscoveryDocument = (
  doc: unknown
): Result<B2cDiscoveryDocument, DiscoveryError> => {
  if (doc === null || typeof doc !== 'object' || Array.isArray(doc)) {
    return err(createDiscoveryError('Discovery document is not an object'));
  }

  const d = doc as Record<string, unknown>;
  const issuer = d['issuer'];
  const jwksUri = d['jwks_uri'];

  if (typeof issuer !== 'string' || issuer.length === 0) {
    return err(createDiscoveryError('Discovery document missing "issuer"'));
  }
  if (typeof jwksUri !== 'string' || jwksUri.length === 0) {
    return err(createDiscoveryError('Discovery document missing "jwks_uri"'));
  }

  return ok({ ...d, issuer, jwks_uri: jwksUri });
};

/**
 * Options for resolving issuer metadata.
 */
export interface ResolveIssuerMetadataOptions {
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

/**
 * Fetches the tenant's discovery document and extracts the issuer and key-set location.
 * Makes a single attempt; retry policy belongs to the caller.
 *
 * @param httpClient - HTTP client to use for the request
 * @param tenant - Tenant configuration
 * @param options - Optional abort signal and logger
 * @returns Result with issuer metadata or DiscoveryError
 */
export const resolveIssuerMetadata = async (
  httpClient: HttpClient,
  tenant: TenantConfig,
  options: ResolveIssuerMetadataOptions = {}
): Promise<Result<IssuerMetadata, DiscoveryError>> => {
  const { signal, logger } = options;
  const url = buildDiscoveryUrl(tenant.tenantName, tenant.policyName, tenant.authorityHost);

  const response = await httpClient.json<unknown>({
    url,
    method: 'GET',
    ...(signal !== undefined ? { signal } : {}),
  });

  if (response.isErr()) {
    return err(createDiscoveryHttpError(url, response.error));
  }

  if (response.value.status >= 400) {
    return err(createDiscoveryError(`HTTP ${String(response.value.status)} from ${url}`));
  }

  const document = validateDiscoveryDocument(response.value.body);

  if (document.isErr()) {
    return err(document.error);
  }

  logger?.debug(
    { discoveryUrl: url, issuer: document.value.issuer, jwksUri: document.value.jwks_uri },
    'issuer metadata resolved'
  );

  return ok({
    issuer: document.value.issuer,
    jwksUri: document.value.jwks_uri,
    discoveryUrl: url,
  });
};
