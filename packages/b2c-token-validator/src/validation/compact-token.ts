import { base64url, decodeJwt, decodeProtectedHeader, type ProtectedHeaderParameters } from 'jose';
import { ok, err, type Result } from 'neverthrow';
import type { ClaimSet, InvalidResult } from '../types.js';
import { createInvalidResult } from './errors.js';

/**
 * A compact JWS split into its segments, with header and signature decoded.
 * The payload stays encoded until the signature has been checked.
 */
export interface CompactToken {
  readonly header: ProtectedHeaderParameters;
  /** `header.payload` exactly as received */
  readonly signingInput: string;
  readonly signature: Uint8Array;
  /** The original serialization */
  readonly raw: string;
}

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * Checks if a string appears to be a JWT (3 base64url-encoded parts separated by dots).
 *
 * @param token - The token string to check
 * @returns true if the token has JWT format
 */
export const isJwtFormat = (token: string): boolean => {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return false;
  }
  return parts.every((part) => part.length > 0 && BASE64URL_SEGMENT.test(part));
};

/**
 * Checks that a segment is the one encoding of the bytes it decodes to.
 * The decoder ignores the unused low bits of the last character.
 */
const isCanonicalSegment = (segment: string): boolean =>
  base64url.encode(base64url.decode(segment)) === segment;

/**
 * Splits a compact token and decodes its header and signature.
 *
 * @param token - Compact serialization `header.payload.signature`
 * @returns Result with the decoded token or a MALFORMED_TOKEN rejection
 */
export const decodeCompactToken = (token: string): Result<CompactToken, InvalidResult> => {
  if (!isJwtFormat(token)) {
    return err(
      createInvalidResult('MALFORMED_TOKEN', 'Token must have three non-empty base64url segments')
    );
  }

  const [headerSegment = '', payloadSegment = '', signatureSegment = ''] = token.split('.');

  const segments = [
    ['header', headerSegment],
    ['payload', payloadSegment],
    ['signature', signatureSegment],
  ] as const;
  for (const [name, segment] of segments) {
    if (!isCanonicalSegment(segment)) {
      return err(createInvalidResult('MALFORMED_TOKEN', `Token ${name} is not canonical base64url`));
    }
  }

  let header: ProtectedHeaderParameters;
  try {
    header = decodeProtectedHeader(token);
  } catch {
    return err(createInvalidResult('MALFORMED_TOKEN', 'Token header is not a JSON object'));
  }

  const signature = base64url.decode(signatureSegment);

  return ok({
    header,
    signingInput: `${headerSegment}.${payloadSegment}`,
    signature,
    raw: token,
  });
};

/**
 * Decodes the payload of a token whose signature has been verified.
 *
 * @param token - The decoded compact token
 * @returns Result with the claim set or a MALFORMED_TOKEN rejection
 */
export const decodeClaimSet = (token: CompactToken): Result<ClaimSet, InvalidResult> => {
  try {
    return ok(Object.freeze(decodeJwt(token.raw)));
  } catch {
    return err(createInvalidResult('MALFORMED_TOKEN', 'Token payload is not a JSON object'));
  }
};
