import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';

/**
 * OpenID discovery document published per tenant policy.
 * Only the fields the validator relies on are typed.
 */
export interface B2cDiscoveryDocument {
  /** Issuer identifier tokens carry in `iss` */
  readonly issuer: string;
  /** JWKS URI for public keys */
  readonly jwks_uri: string;
  /** Any other metadata the provider publishes */
  readonly [key: string]: unknown;
}

/**
 * Options for the synchronous token verifier.
 */
export interface VerifyOptions {
  /** Clock returning milliseconds since epoch (default: Date.now) */
  readonly now?: () => number;
  /**
   * Leeway in seconds applied to `exp` and `nbf` (default: 0).
   * Keep it small; it widens the window in which an expired token is accepted.
   */
  readonly clockToleranceSeconds?: number;
}

/**
 * Configuration for creating a validator.
 */
export interface B2cValidatorConfig {
  /** B2C tenant name */
  readonly tenantName: string;
  /** Policy / user-flow name */
  readonly policyName: string;
  /** Accepted audiences (application IDs). Omit to skip the audience check. */
  readonly allowedAudiences?: readonly string[] | undefined;
  /** Custom domain serving the tenant (default: {tenantName}.b2clogin.com) */
  readonly authorityHost?: string | undefined;
  /** Leeway in seconds for `exp`/`nbf` (default: 0) */
  readonly clockToleranceSeconds?: number | undefined;
  /**
   * Minimum age of the active key set before another refresh may fetch (default: 0, no limit).
   */
  readonly minRefreshIntervalMs?: number | undefined;
}

/**
 * Collaborators injected into a validator.
 */
export interface B2cValidatorOptions {
  /** HTTP client (default: createFetchClient()) */
  readonly httpClient?: HttpClient;
  /** pino logger (default: silent) */
  readonly logger?: Logger;
  /** Clock returning milliseconds since epoch (default: Date.now) */
  readonly now?: () => number;
}
