/**
 * B2C token validator - access token validation for B2C tenant policies
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Token Validation
// ============================================================================

export { createB2cTokenValidator, projectClaims, b2cAccessTokenClaimsSchema } from './validation/index.js';
export type {
  B2cTokenValidator,
  B2cValidatorConfig,
  B2cValidatorOptions,
  ClaimProjectionError,
  B2cAccessTokenClaims,
} from './validation/index.js';

// ============================================================================
// ADVANCED: Building Blocks (custom key management)
// ============================================================================

export {
  verifyToken,
  isJwtFormat,
  isSupportedAlgorithm,
  SUPPORTED_ALGORITHMS,
  validateClaims,
  createTenantConfig,
  buildDiscoveryUrl,
  resolveIssuerMetadata,
} from './validation/index.js';
export type {
  VerifyOptions,
  ClaimCheckContext,
  TenantConfigInput,
  ResolveIssuerMetadataOptions,
  B2cDiscoveryDocument,
} from './validation/index.js';

export { parseKeySet, fetchKeySet, createKeyStore } from './keys/index.js';
export type { KeyStore, KeyStoreOptions, KeySetFetcher, FetchKeySetOptions } from './keys/index.js';

// ============================================================================
// ADVANCED: Custom HTTP Implementations
// ============================================================================

export { createFetchClient } from './http/index.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';
