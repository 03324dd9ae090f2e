import { describe, it, expect, beforeAll } from 'vitest';
import { ok, type Result } from 'neverthrow';
import { createB2cTokenValidator } from './token-validator.js';
import type { HttpError, HttpResponse } from '../http/types.js';
import {
  createCapturingLogger,
  createDeferred,
  createHttpError,
  createMockHttpClient,
  createRoutingHttpClient,
  toRouteResult,
} from '../test/mocks.js';
import {
  createJwksDocument,
  createTestSigningKey,
  signToken,
  type TestSigningKey,
} from '../test/keys.js';
import {
  FIXED_NOW_MS,
  TEST_AUDIENCE,
  TEST_DISCOVERY_URL,
  TEST_ISSUER,
  TEST_JWKS_URI,
  TEST_POLICY,
  TEST_TENANT,
  createDiscoveryDocument,
  createValidClaims,
  fixedNow,
} from '../test/fixtures.js';

const config = {
  tenantName: TEST_TENANT,
  policyName: TEST_POLICY,
  allowedAudiences: [TEST_AUDIENCE],
};

describe('createB2cTokenValidator', () => {
  let k1: TestSigningKey;
  let k2: TestSigningKey;

  const createRoutes = (...keys: readonly TestSigningKey[]) =>
    createRoutingHttpClient({
      [TEST_DISCOVERY_URL]: { body: createDiscoveryDocument() },
      [TEST_JWKS_URI]: { body: createJwksDocument(...keys) },
    });

  beforeAll(async () => {
    k1 = await createTestSigningKey('k1');
    k2 = await createTestSigningKey('k2');
  });

  describe('construction', () => {
    describe('given discovery and keys are served', () => {
      it('returns a validator bound to the tenant issuer and keys', async () => {
        const httpClient = createRoutes(k1);

        const result = await createB2cTokenValidator(config, { httpClient, now: fixedNow });

        expect(result.isOk()).toBe(true);
        if (result.isOk()) {
          expect(result.value.metadata).toEqual({
            issuer: TEST_ISSUER,
            jwksUri: TEST_JWKS_URI,
            discoveryUrl: TEST_DISCOVERY_URL,
          });
          expect(result.value.tenant.allowedAudiences).toEqual([TEST_AUDIENCE]);
          expect([...result.value.currentKeySet().keys.keys()]).toEqual(['k1']);
          expect(result.value.currentKeySet().fetchedAt).toBe(FIXED_NOW_MS);
        }
        expect(httpClient.requests.map((request) => request.url)).toEqual([
          TEST_DISCOVERY_URL,
          TEST_JWKS_URI,
        ]);
      });

      it('logs readiness with tenant bindings', async () => {
        const { logger, records } = createCapturingLogger();

        await createB2cTokenValidator(config, { httpClient: createRoutes(k1, k2), logger });

        const ready = records.find((record) => record['msg'] === 'token validator ready');
        expect(ready).toMatchObject({
          level: 30,
          tenant: TEST_TENANT,
          policy: TEST_POLICY,
          issuer: TEST_ISSUER,
          keyCount: 2,
        });
      });
    });

    describe('given invalid tenant input', () => {
      it('returns INVALID_TENANT_CONFIG without any request', async () => {
        const httpClient = createRoutes(k1);

        const result = await createB2cTokenValidator(
          { ...config, tenantName: ' ' },
          { httpClient }
        );

        expect(result._unsafeUnwrapErr()).toEqual({
          code: 'INVALID_TENANT_CONFIG',
          message: 'Tenant name must not be empty',
        });
        expect(httpClient.requests).toHaveLength(0);
      });
    });

    describe('given discovery fails', () => {
      it('returns DISCOVERY_ERROR and logs it', async () => {
        const httpClient = createRoutingHttpClient({});
        const { logger, records } = createCapturingLogger();

        const result = await createB2cTokenValidator(config, { httpClient, logger });

        expect(result._unsafeUnwrapErr().code).toBe('DISCOVERY_ERROR');
        expect(httpClient.countFor(TEST_JWKS_URI)).toBe(0);
        expect(records.some((record) => record['msg'] === 'issuer discovery failed')).toBe(true);
      });
    });

    describe('given the initial key fetch fails', () => {
      it('returns KEY_FETCH_ERROR', async () => {
        const httpClient = createRoutingHttpClient({
          [TEST_DISCOVERY_URL]: { body: createDiscoveryDocument() },
          [TEST_JWKS_URI]: { error: createHttpError() },
        });

        const result = await createB2cTokenValidator(config, { httpClient });

        expect(result._unsafeUnwrapErr()).toMatchObject({
          code: 'KEY_FETCH_ERROR',
          message: `Failed to fetch signing keys from ${TEST_JWKS_URI}: connect ECONNREFUSED`,
        });
      });
    });
  });

  describe('validateAccessToken', () => {
    describe('given no token', () => {
      it.each([undefined, '', '   '])('returns MISSING_TOKEN for %j', async (token) => {
        const validator = (
          await createB2cTokenValidator(config, { httpClient: createRoutes(k1), now: fixedNow })
        )._unsafeUnwrap();

        expect(validator.validateAccessToken(token)._unsafeUnwrapErr()).toEqual({
          code: 'MISSING_TOKEN',
          message: 'No access token provided',
        });
      });
    });

    describe('given a valid token', () => {
      it('returns valid with the claims', async () => {
        const validator = (
          await createB2cTokenValidator(config, { httpClient: createRoutes(k1), now: fixedNow })
        )._unsafeUnwrap();
        const claims = createValidClaims();
        const token = await signToken(k1, claims);

        expect(validator.validateAccessToken(token)._unsafeUnwrap()).toEqual({
          status: 'valid',
          claims,
        });
      });

      it('ignores surrounding whitespace', async () => {
        const validator = (
          await createB2cTokenValidator(config, { httpClient: createRoutes(k1), now: fixedNow })
        )._unsafeUnwrap();
        const token = await signToken(k1, createValidClaims());

        expect(validator.validateAccessToken(` ${token}\n`)._unsafeUnwrap().status).toBe('valid');
      });
    });

    describe('given a clock tolerance', () => {
      it('accepts a recently expired token', async () => {
        const validator = (
          await createB2cTokenValidator(
            { ...config, clockToleranceSeconds: 60 },
            { httpClient: createRoutes(k1), now: fixedNow }
          )
        )._unsafeUnwrap();
        const token = await signToken(
          k1,
          createValidClaims({ exp: FIXED_NOW_MS / 1000 - 30 })
        );

        expect(validator.validateAccessToken(token)._unsafeUnwrap().status).toBe('valid');
      });
    });

    describe('given an invalid token', () => {
      it('logs the reason at debug', async () => {
        const { logger, records } = createCapturingLogger();
        const validator = (
          await createB2cTokenValidator(config, {
            httpClient: createRoutes(k1),
            logger,
            now: fixedNow,
          })
        )._unsafeUnwrap();
        const token = await signToken(k1, createValidClaims({ aud: 'someone-else' }));

        validator.validateAccessToken(token);

        expect(records.at(-1)).toMatchObject({
          level: 20,
          reason: 'AUDIENCE_MISMATCH',
          msg: 'Token audience does not match',
        });
      });
    });
  });

  describe('key rotation', () => {
    describe('given a token signed with a newly published key', () => {
      it('validates after one refresh', async () => {
        const httpClient = createRoutes(k1);
        const validator = (
          await createB2cTokenValidator(config, { httpClient, now: fixedNow })
        )._unsafeUnwrap();
        const token = await signToken(k2, createValidClaims());

        expect(validator.validateAccessToken(token)._unsafeUnwrap()).toEqual({
          status: 'need-key-refresh',
          kid: 'k2',
        });

        httpClient.setRoute(TEST_JWKS_URI, { body: createJwksDocument(k1, k2) });
        const refreshed = await validator.refreshValidationKeys();

        expect(refreshed.isOk()).toBe(true);
        expect(validator.validateAccessToken(token)._unsafeUnwrap().status).toBe('valid');
        expect(httpClient.countFor(TEST_JWKS_URI)).toBe(2);
      });
    });

    describe('given a retired key', () => {
      it('asks for a refresh for tokens it signed', async () => {
        const httpClient = createRoutes(k1);
        const validator = (
          await createB2cTokenValidator(config, { httpClient, now: fixedNow })
        )._unsafeUnwrap();
        const token = await signToken(k1, createValidClaims());

        httpClient.setRoute(TEST_JWKS_URI, { body: createJwksDocument(k2) });
        await validator.refreshValidationKeys();

        expect(validator.validateAccessToken(token)._unsafeUnwrap()).toEqual({
          status: 'need-key-refresh',
          kid: 'k1',
        });
      });
    });

    describe('given 50 concurrent refreshes', () => {
      it('fetches the keys once more', async () => {
        const httpClient = createRoutes(k1);
        const validator = (
          await createB2cTokenValidator(config, { httpClient, now: fixedNow })
        )._unsafeUnwrap();

        const results = await Promise.all(
          Array.from({ length: 50 }, () => validator.refreshValidationKeys())
        );

        expect(results.every((result) => result.isOk())).toBe(true);
        expect(httpClient.countFor(TEST_JWKS_URI)).toBe(2);
      });
    });

    describe('given the refresh fails', () => {
      it('keeps validating with the previous keys', async () => {
        const httpClient = createRoutes(k1);
        const validator = (
          await createB2cTokenValidator(config, { httpClient, now: fixedNow })
        )._unsafeUnwrap();
        const before = validator.currentKeySet();
        const token = await signToken(k1, createValidClaims());

        httpClient.setRoute(TEST_JWKS_URI, { body: { error: 'unavailable' }, status: 503 });
        const refreshed = await validator.refreshValidationKeys();

        expect(refreshed._unsafeUnwrapErr().message).toBe(`HTTP 503 from ${TEST_JWKS_URI}`);
        expect(validator.currentKeySet()).toBe(before);
        expect(validator.validateAccessToken(token)._unsafeUnwrap().status).toBe('valid');
      });
    });

    describe('given a minimum refresh interval', () => {
      it('throttles a refresh of fresh keys', async () => {
        const httpClient = createRoutes(k1);
        const validator = (
          await createB2cTokenValidator(
            { ...config, minRefreshIntervalMs: 60_000 },
            { httpClient, now: fixedNow }
          )
        )._unsafeUnwrap();

        const refreshed = await validator.refreshValidationKeys();

        expect(refreshed._unsafeUnwrapErr().code).toBe('REFRESH_THROTTLED');
        expect(httpClient.countFor(TEST_JWKS_URI)).toBe(1);
      });
    });

    describe('given the refresh is cancelled', () => {
      it('resolves waiters with REFRESH_CANCELLED and keeps the keys', async () => {
        const pendingKeys = createDeferred<Result<HttpResponse<unknown>, HttpError>>();
        let jwksCalls = 0;
        const httpClient = createMockHttpClient((request) => {
          if (request.url === TEST_DISCOVERY_URL) {
            return Promise.resolve(toRouteResult({ body: createDiscoveryDocument() }));
          }
          jwksCalls += 1;
          return jwksCalls === 1
            ? Promise.resolve(toRouteResult({ body: createJwksDocument(k1) }))
            : pendingKeys.promise;
        });
        const validator = (
          await createB2cTokenValidator(config, { httpClient, now: fixedNow })
        )._unsafeUnwrap();
        const before = validator.currentKeySet();

        const waiting = [validator.refreshValidationKeys(), validator.refreshValidationKeys()];
        expect(validator.cancelRefresh()).toBe(true);
        pendingKeys.resolve(
          ok({ status: 200, statusText: 'OK', headers: {}, body: createJwksDocument(k2) })
        );
        const results = await Promise.all(waiting);

        expect(results.map((result) => result._unsafeUnwrapErr().code)).toEqual([
          'REFRESH_CANCELLED',
          'REFRESH_CANCELLED',
        ]);
        expect(validator.currentKeySet()).toBe(before);
        expect(httpClient.requests[2]?.signal?.aborted).toBe(true);
      });
    });
  });
});
