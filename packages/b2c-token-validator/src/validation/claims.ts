import { ok, err, type Result } from 'neverthrow';
import type { ClaimSet, InvalidResult, TenantConfig } from '../types.js';
import { createInvalidResult } from './errors.js';

/**
 * Inputs for the standard claim checks.
 */
export interface ClaimCheckContext {
  readonly expectedIssuer: string;
  readonly tenant: TenantConfig;
  /** Current time in seconds since epoch */
  readonly nowSeconds: number;
  readonly clockToleranceSeconds: number;
}

/**
 * Reads the user-flow name from a claim set.
 * B2C writes it to `tfp` or, when configured for OIDC compliance, to `acr`.
 */
export const getPolicyClaim = (claims: ClaimSet): string | undefined => {
  const tfp = claims['tfp'];
  if (typeof tfp === 'string') {
    return tfp;
  }
  const acr = claims['acr'];
  return typeof acr === 'string' ? acr : undefined;
};

/**
 * Normalizes the `aud` claim to a list of strings.
 */
export const getAudienceClaim = (claims: ClaimSet): readonly string[] => {
  const aud = claims['aud'];
  if (typeof aud === 'string') {
    return [aud];
  }
  if (Array.isArray(aud)) {
    const values: readonly unknown[] = aud;
    return values.filter((value): value is string => typeof value === 'string');
  }
  return [];
};

const checkExpiry = (claims: ClaimSet, context: ClaimCheckContext): InvalidResult | undefined => {
  const exp = claims['exp'];
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return createInvalidResult('CLAIM_EXPIRED', 'Token has no numeric "exp" claim');
  }
  if (exp <= context.nowSeconds - context.clockToleranceSeconds) {
    return createInvalidResult('CLAIM_EXPIRED');
  }
  return undefined;
};

const checkNotBefore = (
  claims: ClaimSet,
  context: ClaimCheckContext
): InvalidResult | undefined => {
  const nbf = claims['nbf'];
  if (nbf === undefined) {
    return undefined;
  }
  if (typeof nbf !== 'number' || !Number.isFinite(nbf)) {
    return createInvalidResult('CLAIM_NOT_YET_VALID', 'Token "nbf" claim is not numeric');
  }
  if (nbf > context.nowSeconds + context.clockToleranceSeconds) {
    return createInvalidResult('CLAIM_NOT_YET_VALID');
  }
  return undefined;
};

const checkIssuer = (claims: ClaimSet, context: ClaimCheckContext): InvalidResult | undefined =>
  claims['iss'] === context.expectedIssuer ? undefined : createInvalidResult('ISSUER_MISMATCH');

const checkPolicy = (claims: ClaimSet, context: ClaimCheckContext): InvalidResult | undefined => {
  const policy = getPolicyClaim(claims);
  if (policy?.toLowerCase() === context.tenant.policyName.toLowerCase()) {
    return undefined;
  }
  return createInvalidResult(
    'POLICY_MISMATCH',
    policy === undefined
      ? 'Token has no policy claim'
      : `Token was issued for policy "${policy}"`
  );
};

const checkAudience = (claims: ClaimSet, context: ClaimCheckContext): InvalidResult | undefined => {
  const allowed = context.tenant.allowedAudiences;
  if (allowed === undefined) {
    return undefined;
  }
  const audiences = getAudienceClaim(claims);
  return audiences.some((audience) => allowed.includes(audience))
    ? undefined
    : createInvalidResult('AUDIENCE_MISMATCH');
};

/** Checks in the order they are applied; the first failure wins. */
const CLAIM_CHECKS = [checkExpiry, checkNotBefore, checkIssuer, checkPolicy, checkAudience] as const;

/**
 * Validates the standard claims of a verified token.
 *
 * Order: expiry, not-before, issuer, policy, audience (skipped when no
 * audiences are configured). Stops at the first failure.
 *
 * @param claims - Decoded payload of a token with a verified signature
 * @param context - Expected issuer, tenant and clock
 * @returns Result with the same claim set or the rejection
 */
export const validateClaims = (
  claims: ClaimSet,
  context: ClaimCheckContext
): Result<ClaimSet, InvalidResult> => {
  for (const check of CLAIM_CHECKS) {
    const failure = check(claims, context);
    if (failure !== undefined) {
      return err(failure);
    }
  }
  return ok(claims);
};
