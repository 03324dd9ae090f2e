/**
 * Token check: validate, refreshing keys once when the token names an unknown key.
 *
 * @packageDocumentation
 */

import { err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import {
  projectClaims,
  b2cAccessTokenClaimsSchema,
  type B2cAccessTokenClaims,
  type B2cTokenValidator,
  type ValidationResult,
} from 'b2c-token-validator';

/**
 * Why a token check did not produce claims.
 */
export interface CheckFailure {
  /** Rejection reason or error code (e.g., CLAIM_EXPIRED, KEY_FETCH_ERROR) */
  readonly code: string;
  readonly message: string;
}

const UNKNOWN_SIGNING_KEY = 'UNKNOWN_SIGNING_KEY';

/**
 * Maps a final validation result to projected claims or a failure.
 * A key miss here is final: keys were already refreshed or could not be.
 */
const toOutcome = (result: ValidationResult): Result<B2cAccessTokenClaims, CheckFailure> => {
  switch (result.status) {
    case 'valid':
      return projectClaims(result.claims, b2cAccessTokenClaimsSchema).mapErr((error) => ({
        code: error.code,
        message: error.message,
      }));
    case 'need-key-refresh':
      return err({
        code: UNKNOWN_SIGNING_KEY,
        message: `Token is signed with unknown key "${result.kid}"`,
      });
    case 'invalid':
      return err({ code: result.reason, message: result.message });
  }
};

/**
 * Validates a token, refreshing the signing keys and retrying once on a key miss.
 *
 * @param validator - Validator for the tenant policy
 * @param token - Compact access token
 * @param logger - pino logger
 * @returns Result with the projected claims or why the token was not accepted
 */
export async function checkToken(
  validator: B2cTokenValidator,
  token: string | undefined,
  logger: Logger
): Promise<Result<B2cAccessTokenClaims, CheckFailure>> {
  const first = validator.validateAccessToken(token);

  if (first.isErr()) {
    return err({ code: first.error.code, message: first.error.message });
  }

  if (first.value.status !== 'need-key-refresh') {
    return toOutcome(first.value);
  }

  logger.info({ kid: first.value.kid }, 'token signed with unknown key; refreshing keys');

  const refreshed = await validator.refreshValidationKeys();
  if (refreshed.isErr()) {
    return err({ code: refreshed.error.code, message: refreshed.error.message });
  }

  const second = validator.validateAccessToken(token);
  if (second.isErr()) {
    return err({ code: second.error.code, message: second.error.message });
  }

  return toOutcome(second.value);
}
