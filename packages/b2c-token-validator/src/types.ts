import type { KeyObject } from 'node:crypto';

/**
 * Tenant and user-flow configuration a validator is bound to.
 * Frozen once created by `createTenantConfig`.
 */
export interface TenantConfig {
  /** B2C tenant name (e.g., "contoso" for contoso.onmicrosoft.com) */
  readonly tenantName: string;
  /** Policy / user-flow name (e.g., "B2C_1_signupsignin") */
  readonly policyName: string;
  /** Accepted audiences. Audience checking is skipped when undefined. */
  readonly allowedAudiences?: readonly string[] | undefined;
  /**
   * Authority host override for B2C custom domains
   * (default: "{tenantName}.b2clogin.com").
   */
  readonly authorityHost?: string | undefined;
}

/**
 * Issuer metadata resolved once from the tenant's discovery document.
 */
export interface IssuerMetadata {
  /** Exact issuer string tokens must carry in `iss` */
  readonly issuer: string;
  /** Location of the JWKS document */
  readonly jwksUri: string;
  /** Discovery URL the metadata was resolved from */
  readonly discoveryUrl: string;
}

/**
 * RSA signature algorithms accepted in token headers.
 */
export type SupportedAlgorithm = 'RS256' | 'RS384' | 'RS512' | 'PS256' | 'PS384' | 'PS512';

/**
 * A public signing key taken from the JWKS document.
 */
export interface SigningKey {
  /** Key identifier */
  readonly kid: string;
  readonly kty: 'RSA';
  /** RSA modulus (base64url) */
  readonly n: string;
  /** RSA public exponent (base64url) */
  readonly e: string;
  /** Algorithm the key is restricted to, when the JWKS advertises one */
  readonly alg?: string | undefined;
  /** Imported public key used for signature verification */
  readonly publicKey: KeyObject;
}

/**
 * Immutable snapshot of the signing keys, keyed by `kid`.
 */
export interface KeySet {
  readonly keys: ReadonlyMap<string, SigningKey>;
  /** When the snapshot was fetched (ms since epoch) */
  readonly fetchedAt: number;
}

/**
 * Decoded token payload. Values are untyped until projected by the caller.
 */
export type ClaimSet = Readonly<Record<string, unknown>>;

/**
 * Reasons a token is rejected.
 */
export type InvalidReason =
  | 'MALFORMED_TOKEN'
  | 'UNSUPPORTED_ALGORITHM'
  | 'SIGNATURE_INVALID'
  | 'CLAIM_EXPIRED'
  | 'CLAIM_NOT_YET_VALID'
  | 'ISSUER_MISMATCH'
  | 'POLICY_MISMATCH'
  | 'AUDIENCE_MISMATCH';

/**
 * Token is authentic and every claim check passed.
 */
export interface ValidResult {
  readonly status: 'valid';
  readonly claims: ClaimSet;
}

/**
 * Token names a key the active snapshot does not hold.
 * Refresh the keys and validate once more.
 */
export interface NeedKeyRefreshResult {
  readonly status: 'need-key-refresh';
  /** The unrecognized key identifier */
  readonly kid: string;
}

/**
 * Token was rejected.
 */
export interface InvalidResult {
  readonly status: 'invalid';
  readonly reason: InvalidReason;
  /** Human-readable explanation */
  readonly message: string;
}

/**
 * Discriminated union of token validation outcomes.
 */
export type ValidationResult = ValidResult | NeedKeyRefreshResult | InvalidResult;

/**
 * Tenant configuration input was rejected.
 */
export interface TenantConfigError {
  readonly code: 'INVALID_TENANT_CONFIG';
  readonly message: string;
}

/**
 * Issuer metadata could not be resolved.
 */
export interface DiscoveryError {
  readonly code: 'DISCOVERY_ERROR';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Signing keys could not be fetched, or a refresh did not run to completion.
 */
export interface KeyFetchError {
  readonly code: 'KEY_FETCH_ERROR' | 'REFRESH_THROTTLED' | 'REFRESH_CANCELLED';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Validation could not be attempted at all.
 */
export interface VerifierError {
  readonly code: 'MISSING_TOKEN';
  readonly message: string;
}

/**
 * Errors that prevent a validator from being constructed.
 */
export type ConstructionError = TenantConfigError | DiscoveryError | KeyFetchError;
