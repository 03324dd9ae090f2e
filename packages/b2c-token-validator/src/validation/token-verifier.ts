import { constants, verify, type KeyObject } from 'node:crypto';
import type {
  KeySet,
  SigningKey,
  SupportedAlgorithm,
  TenantConfig,
  ValidationResult,
} from '../types.js';
import type { VerifyOptions } from './types.js';
import { decodeCompactToken, decodeClaimSet } from './compact-token.js';
import { validateClaims } from './claims.js';
import { createInvalidResult } from './errors.js';

interface AlgorithmParameters {
  readonly hash: 'sha256' | 'sha384' | 'sha512';
  readonly pss: boolean;
}

const ALGORITHMS: Readonly<Record<SupportedAlgorithm, AlgorithmParameters>> = {
  RS256: { hash: 'sha256', pss: false },
  RS384: { hash: 'sha384', pss: false },
  RS512: { hash: 'sha512', pss: false },
  PS256: { hash: 'sha256', pss: true },
  PS384: { hash: 'sha384', pss: true },
  PS512: { hash: 'sha512', pss: true },
};

/**
 * Algorithms accepted in token headers.
 */
export const SUPPORTED_ALGORITHMS: readonly SupportedAlgorithm[] = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
];

export const isSupportedAlgorithm = (alg: unknown): alg is SupportedAlgorithm =>
  typeof alg === 'string' && Object.hasOwn(ALGORITHMS, alg);

/**
 * Checks an RSA signature over the signing input. Never throws.
 */
const verifySignature = (
  algorithm: SupportedAlgorithm,
  publicKey: KeyObject,
  signingInput: string,
  signature: Uint8Array
): boolean => {
  const { hash, pss } = ALGORITHMS[algorithm];
  const data = Buffer.from(signingInput, 'ascii');

  try {
    return pss
      ? verify(
          hash,
          data,
          {
            key: publicKey,
            padding: constants.RSA_PKCS1_PSS_PADDING,
            saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
          },
          signature
        )
      : verify(hash, data, publicKey, signature);
  } catch {
    return false;
  }
};

const keyAllowsAlgorithm = (key: SigningKey, algorithm: SupportedAlgorithm): boolean =>
  key.alg === undefined || key.alg === algorithm;

/**
 * Verifies a compact token against a key-set snapshot and validates its claims.
 *
 * Pure and synchronous: everything it needs is in `keySet`. The signature is
 * checked before any claim is read. An unknown `kid` yields `need-key-refresh`
 * rather than a rejection so the caller can refresh keys and try again.
 *
 * @param token - Compact serialization `header.payload.signature`
 * @param keySet - Snapshot to verify against
 * @param expectedIssuer - Issuer from the tenant's discovery document
 * @param tenant - Tenant configuration (policy and audiences)
 * @param options - Clock and clock tolerance
 * @returns The validation outcome
 *
 * @example
 * ```typescript
 * const result = verifyToken(token, store.current(), metadata.issuer, tenant);
 *
 * switch (result.status) {
 *   case 'valid':
 *     console.log('Subject:', result.claims['sub']);
 *     break;
 *   case 'need-key-refresh':
 *     await store.refresh(); // then verify once more
 *     break;
 *   case 'invalid':
 *     console.log('Rejected:', result.reason, result.message);
 * }
 * ```
 */
export const verifyToken = (
  token: string,
  keySet: KeySet,
  expectedIssuer: string,
  tenant: TenantConfig,
  options: VerifyOptions = {}
): ValidationResult => {
  const { now = Date.now, clockToleranceSeconds = 0 } = options;

  const decoded = decodeCompactToken(token);
  if (decoded.isErr()) {
    return decoded.error;
  }

  const { header, signingInput, signature } = decoded.value;
  const { alg, kid } = header;

  if (!isSupportedAlgorithm(alg)) {
    return createInvalidResult(
      'UNSUPPORTED_ALGORITHM',
      alg === undefined
        ? 'Token header has no "alg"'
        : `Token algorithm "${alg}" is not supported`
    );
  }

  if (typeof kid !== 'string' || kid.length === 0) {
    return createInvalidResult('MALFORMED_TOKEN', 'Token header has no "kid"');
  }

  const key = keySet.keys.get(kid);
  if (key === undefined) {
    return { status: 'need-key-refresh', kid };
  }

  if (!keyAllowsAlgorithm(key, alg)) {
    return createInvalidResult(
      'SIGNATURE_INVALID',
      `Key "${kid}" does not allow algorithm "${alg}"`
    );
  }

  if (!verifySignature(alg, key.publicKey, signingInput, signature)) {
    return createInvalidResult('SIGNATURE_INVALID');
  }

  const claims = decodeClaimSet(decoded.value);
  if (claims.isErr()) {
    return claims.error;
  }

  const checked = validateClaims(claims.value, {
    expectedIssuer,
    tenant,
    nowSeconds: now() / 1000,
    clockToleranceSeconds,
  });

  if (checked.isErr()) {
    return checked.error;
  }

  return { status: 'valid', claims: checked.value };
};
