/**
 * Shared test fixtures and constants.
 */

import type { B2cDiscoveryDocument } from '../validation/types.js';
import type { TenantConfig } from '../types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One hour in seconds */
export const ONE_HOUR_SECONDS = 60 * 60;

/** Fixed clock for deterministic claim checks (2023-11-14T22:13:20Z) */
export const FIXED_NOW_MS = 1_700_000_000_000;

export const FIXED_NOW_SECONDS = FIXED_NOW_MS / 1000;

/** Clock function returning FIXED_NOW_MS */
export const fixedNow = (): number => FIXED_NOW_MS;

// ============================================================================
// Tenant Constants
// ============================================================================

export const TEST_TENANT = 'contosotest';
export const TEST_POLICY = 'B2C_1_signin';
export const TEST_TENANT_ID = '00000000-0000-0000-0000-000000000001';
export const TEST_DISCOVERY_URL = `https://${TEST_TENANT}.b2clogin.com/${TEST_TENANT}.onmicrosoft.com/${TEST_POLICY}/v2.0/.well-known/openid-configuration`;
export const TEST_ISSUER = `https://${TEST_TENANT}.b2clogin.com/${TEST_TENANT_ID}/v2.0/`;
export const TEST_JWKS_URI = `https://${TEST_TENANT}.b2clogin.com/${TEST_TENANT}.onmicrosoft.com/b2c_1_signin/discovery/v2.0/keys`;

// ============================================================================
// Token Claims
// ============================================================================

export const TEST_AUDIENCE = 'app-1111';
export const OTHER_AUDIENCE = 'app-2222';
export const TEST_SUBJECT = 'user-123';
export const TEST_OBJECT_ID = 'object-456';

// ============================================================================
// Fixture Factories
// ============================================================================

/**
 * Creates a tenant configuration for verifier tests.
 */
export const createTestTenant = (overrides: Partial<TenantConfig> = {}): TenantConfig => ({
  tenantName: TEST_TENANT,
  policyName: TEST_POLICY,
  allowedAudiences: [TEST_AUDIENCE],
  ...overrides,
});

/**
 * Creates a discovery document as published for a B2C policy.
 */
export const createDiscoveryDocument = (
  overrides: Record<string, unknown> = {}
): B2cDiscoveryDocument => ({
  issuer: TEST_ISSUER,
  authorization_endpoint: `https://${TEST_TENANT}.b2clogin.com/${TEST_TENANT}.onmicrosoft.com/oauth2/v2.0/authorize?p=b2c_1_signin`,
  token_endpoint: `https://${TEST_TENANT}.b2clogin.com/${TEST_TENANT}.onmicrosoft.com/oauth2/v2.0/token?p=b2c_1_signin`,
  jwks_uri: TEST_JWKS_URI,
  response_types_supported: ['code', 'code id_token', 'id_token', 'id_token token'],
  id_token_signing_alg_values_supported: ['RS256'],
  ...overrides,
});

/**
 * Creates claims that pass every check against FIXED_NOW_MS and createTestTenant().
 */
export const createValidClaims = (
  overrides: Record<string, unknown> = {}
): Record<string, unknown> => ({
  iss: TEST_ISSUER,
  sub: TEST_SUBJECT,
  aud: TEST_AUDIENCE,
  exp: FIXED_NOW_SECONDS + ONE_HOUR_SECONDS,
  nbf: FIXED_NOW_SECONDS - 60,
  iat: FIXED_NOW_SECONDS - 60,
  oid: TEST_OBJECT_ID,
  tfp: TEST_POLICY,
  scp: 'read write',
  ver: '1.0',
  ...overrides,
});

/**
 * Returns claims without the named keys.
 */
export const withoutClaims = (
  claims: Record<string, unknown>,
  ...names: readonly string[]
): Record<string, unknown> =>
  Object.fromEntries(Object.entries(claims).filter(([name]) => !names.includes(name)));
