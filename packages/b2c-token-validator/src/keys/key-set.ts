import { createPublicKey } from 'node:crypto';
import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/types.js';
import type { KeyFetchError, KeySet, SigningKey } from '../types.js';
import { createKeyFetchError, createKeyFetchHttpError } from '../validation/errors.js';

/**
 * Checks whether a JWKS entry describes a signing key this validator can use.
 * EC/OKP keys and encryption keys are skipped, not rejected.
 */
const isUsableEntry = (entry: Record<string, unknown>): boolean =>
  entry['kty'] === 'RSA' && entry['use'] !== 'enc';

/**
 * Builds a SigningKey from an RSA JWKS entry.
 */
const toSigningKey = (
  entry: Record<string, unknown>,
  index: number
): Result<SigningKey, KeyFetchError> => {
  const kid = entry['kid'];
  const n = entry['n'];
  const e = entry['e'];
  const alg = entry['alg'];

  if (typeof kid !== 'string' || kid.length === 0) {
    return err(createKeyFetchError(`Key at index ${String(index)} is missing "kid"`));
  }
  if (typeof n !== 'string' || typeof e !== 'string') {
    return err(createKeyFetchError(`Key "${kid}" is missing RSA modulus or exponent`));
  }
  if (alg !== undefined && typeof alg !== 'string') {
    return err(createKeyFetchError(`Key "${kid}" has a non-string "alg"`));
  }

  try {
    const publicKey = createPublicKey({ key: { kty: 'RSA', n, e }, format: 'jwk' });
    if (publicKey.asymmetricKeyType !== 'rsa') {
      return err(createKeyFetchError(`Key "${kid}" is not an RSA public key`));
    }
    const key: SigningKey = { kid, kty: 'RSA', n, e, alg, publicKey };
    return ok(Object.freeze(key));
  } catch (error) {
    return err(createKeyFetchError(`Key "${kid}" has invalid RSA key material`, error));
  }
};

/**
 * Wraps the parsed keys in a frozen read-only view. The backing Map is not
 * reachable, so a snapshot cannot be changed after it is published.
 */
const createKeyMapView = (keys: Map<string, SigningKey>): ReadonlyMap<string, SigningKey> => {
  const view: ReadonlyMap<string, SigningKey> = {
    get size() {
      return keys.size;
    },
    get: (kid) => keys.get(kid),
    has: (kid) => keys.has(kid),
    forEach: (callbackfn, thisArg?: unknown) => {
      keys.forEach((key, kid) => {
        callbackfn.call(thisArg, key, kid, view);
      });
    },
    entries: () => keys.entries(),
    keys: () => keys.keys(),
    values: () => keys.values(),
    [Symbol.iterator]: () => keys[Symbol.iterator](),
  };
  return Object.freeze(view);
};

/**
 * Parses a JWKS document into an immutable KeySet.
 *
 * Unusable entries (non-RSA, `use: "enc"`) are skipped. A malformed RSA entry
 * or a duplicate `kid` rejects the whole document.
 *
 * @param document - The parsed JWKS response body
 * @param fetchedAt - Snapshot timestamp in ms since epoch
 * @returns Result with the KeySet or KeyFetchError
 *
 * @example
 * ```typescript
 * const result = parseKeySet({ keys: [{ kid: 'k1', kty: 'RSA', n, e }] }, Date.now());
 * if (result.isOk()) {
 *   result.value.keys.get('k1');
 * }
 * ```
 */
export const parseKeySet = (document: unknown, fetchedAt: number): Result<KeySet, KeyFetchError> => {
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return err(createKeyFetchError('Key set document is not an object'));
  }

  const rawKeys: unknown = (document as Record<string, unknown>)['keys'];

  if (!Array.isArray(rawKeys)) {
    return err(createKeyFetchError('Key set document missing "keys" array'));
  }

  const entries: readonly unknown[] = rawKeys;

  const keys = new Map<string, SigningKey>();

  for (const [index, entry] of entries.entries()) {
    if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
      return err(createKeyFetchError(`Key at index ${String(index)} is not an object`));
    }

    const record = entry as Record<string, unknown>;
    if (!isUsableEntry(record)) {
      continue;
    }

    const key = toSigningKey(record, index);
    if (key.isErr()) {
      return err(key.error);
    }
    if (keys.has(key.value.kid)) {
      return err(createKeyFetchError(`Duplicate key identifier "${key.value.kid}"`));
    }

    keys.set(key.value.kid, key.value);
  }

  const keySet: KeySet = { keys: createKeyMapView(keys), fetchedAt };
  return ok(Object.freeze(keySet));
};

/**
 * Options for fetching a key set.
 */
export interface FetchKeySetOptions {
  readonly signal?: AbortSignal;
  /** Clock returning milliseconds since epoch (default: Date.now) */
  readonly now?: () => number;
  readonly logger?: Logger;
}

/**
 * Fetches and parses the JWKS document at `jwksUri`.
 *
 * @param httpClient - HTTP client to use for the request
 * @param jwksUri - Key-set location from the issuer metadata
 * @param options - Optional abort signal, clock and logger
 * @returns Result with the KeySet or KeyFetchError
 */
export const fetchKeySet = async (
  httpClient: HttpClient,
  jwksUri: string,
  options: FetchKeySetOptions = {}
): Promise<Result<KeySet, KeyFetchError>> => {
  const { signal, now = Date.now, logger } = options;

  const response = await httpClient.json<unknown>({
    url: jwksUri,
    method: 'GET',
    ...(signal !== undefined ? { signal } : {}),
  });

  if (response.isErr()) {
    return err(createKeyFetchHttpError(jwksUri, response.error));
  }

  if (response.value.status >= 400) {
    return err(createKeyFetchError(`HTTP ${String(response.value.status)} from ${jwksUri}`));
  }

  const keySet = parseKeySet(response.value.body, now());

  if (keySet.isOk()) {
    logger?.debug({ jwksUri, kids: [...keySet.value.keys.keys()] }, 'signing keys fetched');
  }

  return keySet;
};
