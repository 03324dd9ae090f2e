import { describe, it, expect, vi } from 'vitest';
import { ok, err, type Result } from 'neverthrow';
import { pino } from 'pino';
import type {
  B2cTokenValidator,
  KeySet,
  ValidationResult,
  VerifierError,
} from 'b2c-token-validator';
import { checkToken } from './check.js';

const logger = pino({ level: 'silent' });

const emptyKeySet: KeySet = { keys: new Map(), fetchedAt: 0 };

const validClaims = {
  sub: 'user-123',
  iss: 'https://contosotest.b2clogin.com/tenant-id/v2.0/',
  aud: 'app-1111',
  exp: 1_700_003_600,
  oid: 'object-456',
  tfp: 'B2C_1_signin',
  scp: 'read',
};

/**
 * Creates a validator stub returning the given results in order.
 */
const createValidatorStub = (
  results: readonly ValidationResult[],
  refresh: B2cTokenValidator['refreshValidationKeys'] = () => Promise.resolve(ok(undefined))
) => {
  const queue = [...results];
  const validateAccessToken = vi.fn(
    (token: string | undefined): Result<ValidationResult, VerifierError> => {
      if (token === undefined) {
        return err({ code: 'MISSING_TOKEN', message: 'No access token provided' });
      }
      const exhausted: ValidationResult = { status: 'need-key-refresh', kid: 'k9' };
      return ok(queue.shift() ?? exhausted);
    }
  );
  const refreshValidationKeys = vi.fn(refresh);

  const validator: B2cTokenValidator = {
    tenant: { tenantName: 'contosotest', policyName: 'B2C_1_signin' },
    metadata: {
      issuer: validClaims.iss,
      jwksUri: 'https://contosotest.b2clogin.com/keys',
      discoveryUrl: 'https://contosotest.b2clogin.com/discovery',
    },
    validateAccessToken,
    refreshValidationKeys,
    cancelRefresh: () => false,
    currentKeySet: () => emptyKeySet,
  };

  return { validator, validateAccessToken, refreshValidationKeys };
};

describe('checkToken', () => {
  describe('given a valid token', () => {
    it('returns the projected claims without refreshing', async () => {
      const { validator, refreshValidationKeys } = createValidatorStub([
        { status: 'valid', claims: validClaims },
      ]);

      const result = await checkToken(validator, 'token', logger);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.subject).toBe('user-123');
        expect(result.value.objectId).toBe('object-456');
        expect(result.value.policy).toBe('B2C_1_signin');
        expect(result.value.scopes).toEqual(['read']);
      }
      expect(refreshValidationKeys).not.toHaveBeenCalled();
    });
  });

  describe('given a rejected token', () => {
    it('returns the reason and message', async () => {
      const { validator } = createValidatorStub([
        { status: 'invalid', reason: 'CLAIM_EXPIRED', message: 'Token has expired' },
      ]);

      const result = await checkToken(validator, 'token', logger);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'CLAIM_EXPIRED',
        message: 'Token has expired',
      });
    });
  });

  describe('given no token', () => {
    it('returns MISSING_TOKEN', async () => {
      const { validator } = createValidatorStub([]);

      const result = await checkToken(validator, undefined, logger);

      expect(result._unsafeUnwrapErr().code).toBe('MISSING_TOKEN');
    });
  });

  describe('given a token signed with an unknown key', () => {
    it('refreshes once and validates again', async () => {
      const { validator, validateAccessToken, refreshValidationKeys } = createValidatorStub([
        { status: 'need-key-refresh', kid: 'k2' },
        { status: 'valid', claims: validClaims },
      ]);

      const result = await checkToken(validator, 'token', logger);

      expect(result.isOk()).toBe(true);
      expect(refreshValidationKeys).toHaveBeenCalledTimes(1);
      expect(validateAccessToken).toHaveBeenCalledTimes(2);
    });

    it('treats a second miss as invalid', async () => {
      const { validator, validateAccessToken, refreshValidationKeys } = createValidatorStub([
        { status: 'need-key-refresh', kid: 'k2' },
        { status: 'need-key-refresh', kid: 'k2' },
      ]);

      const result = await checkToken(validator, 'token', logger);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'UNKNOWN_SIGNING_KEY',
        message: 'Token is signed with unknown key "k2"',
      });
      expect(refreshValidationKeys).toHaveBeenCalledTimes(1);
      expect(validateAccessToken).toHaveBeenCalledTimes(2);
    });

    it('returns the refresh error without validating again', async () => {
      const { validator, validateAccessToken } = createValidatorStub(
        [{ status: 'need-key-refresh', kid: 'k2' }],
        () =>
          Promise.resolve(
            err({ code: 'KEY_FETCH_ERROR' as const, message: 'HTTP 503 from keys' })
          )
      );

      const result = await checkToken(validator, 'token', logger);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'KEY_FETCH_ERROR',
        message: 'HTTP 503 from keys',
      });
      expect(validateAccessToken).toHaveBeenCalledTimes(1);
    });
  });

  describe('given valid claims that do not fit the projection', () => {
    it('returns CLAIM_PROJECTION_ERROR', async () => {
      const { validator } = createValidatorStub([
        { status: 'valid', claims: { ...validClaims, sub: 42 } },
      ]);

      const result = await checkToken(validator, 'token', logger);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'CLAIM_PROJECTION_ERROR',
        message: 'sub: Expected string, received number',
      });
    });
  });
});
