// Main factory
export { createB2cTokenValidator } from './token-validator.js';
export type { B2cTokenValidator } from './token-validator.js';

// Synchronous verifier
export { verifyToken, isSupportedAlgorithm, SUPPORTED_ALGORITHMS } from './token-verifier.js';
export { isJwtFormat } from './compact-token.js';
export { validateClaims, getPolicyClaim, getAudienceClaim } from './claims.js';
export type { ClaimCheckContext } from './claims.js';

// Tenant configuration and discovery
export { createTenantConfig } from './tenant-config.js';
export type { TenantConfigInput } from './tenant-config.js';
export { buildDiscoveryUrl, resolveIssuerMetadata } from './discovery.js';
export type { ResolveIssuerMetadataOptions } from './discovery.js';

// Claims projection
export { projectClaims, b2cAccessTokenClaimsSchema } from './claims-projection.js';
export type { ClaimProjectionError, B2cAccessTokenClaims } from './claims-projection.js';

// Types
export type {
  B2cDiscoveryDocument,
  B2cValidatorConfig,
  B2cValidatorOptions,
  VerifyOptions,
} from './types.js';
