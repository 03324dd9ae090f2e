import type {
  InvalidReason,
  InvalidResult,
  DiscoveryError,
  KeyFetchError,
  TenantConfigError,
  VerifierError,
} from '../types.js';
import type { HttpError } from '../http/types.js';

/**
 * Default messages for each rejection reason.
 */
export const defaultInvalidMessages: Record<InvalidReason, string> = {
  MALFORMED_TOKEN: 'Token is malformed',
  UNSUPPORTED_ALGORITHM: 'Token signing algorithm is not supported',
  SIGNATURE_INVALID: 'Token signature verification failed',
  CLAIM_EXPIRED: 'Token has expired',
  CLAIM_NOT_YET_VALID: 'Token is not yet valid',
  ISSUER_MISMATCH: 'Token issuer does not match',
  POLICY_MISMATCH: 'Token policy does not match',
  AUDIENCE_MISMATCH: 'Token audience does not match',
};

/**
 * Creates an `invalid` validation result.
 *
 * @param reason - Why the token was rejected
 * @param message - Optional detail; falls back to the default message for the reason
 */
export const createInvalidResult = (reason: InvalidReason, message?: string): InvalidResult => ({
  status: 'invalid',
  reason,
  message: message ?? defaultInvalidMessages[reason],
});

/**
 * Describes an HTTP failure in one line.
 */
const describeHttpError = (error: HttpError): string =>
  error.status !== undefined ? `${error.message} (status ${String(error.status)})` : error.message;

export const createTenantConfigError = (message: string): TenantConfigError => ({
  code: 'INVALID_TENANT_CONFIG',
  message,
});

export const createDiscoveryError = (message: string, cause?: unknown): DiscoveryError => ({
  code: 'DISCOVERY_ERROR',
  message,
  cause,
});

/**
 * Creates a DiscoveryError for a failed discovery request.
 */
export const createDiscoveryHttpError = (url: string, error: HttpError): DiscoveryError =>
  createDiscoveryError(
    `Failed to fetch discovery document from ${url}: ${describeHttpError(error)}`,
    error
  );

export const createKeyFetchError = (message: string, cause?: unknown): KeyFetchError => ({
  code: 'KEY_FETCH_ERROR',
  message,
  cause,
});

/**
 * Creates a KeyFetchError for a failed JWKS request.
 */
export const createKeyFetchHttpError = (url: string, error: HttpError): KeyFetchError =>
  createKeyFetchError(`Failed to fetch signing keys from ${url}: ${describeHttpError(error)}`, error);

export const createRefreshThrottledError = (retryAfterMs: number): KeyFetchError => ({
  code: 'REFRESH_THROTTLED',
  message: `Signing keys were refreshed too recently; retry in ${String(Math.ceil(retryAfterMs / 1000))}s`,
});

export const createRefreshCancelledError = (cause?: unknown): KeyFetchError => ({
  code: 'REFRESH_CANCELLED',
  message: 'Signing key refresh was cancelled',
  cause,
});

export const createMissingTokenError = (): VerifierError => ({
  code: 'MISSING_TOKEN',
  message: 'No access token provided',
});
