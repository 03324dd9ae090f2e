import { ok, err, type Result } from 'neverthrow';
import type {
  ConstructionError,
  IssuerMetadata,
  KeyFetchError,
  KeySet,
  TenantConfig,
  ValidationResult,
  VerifierError,
} from '../types.js';
import type { B2cValidatorConfig, B2cValidatorOptions } from './types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { fetchKeySet } from '../keys/key-set.js';
import { createKeyStore } from '../keys/key-store.js';
import { createSilentLogger } from '../logger.js';
import { createTenantConfig } from './tenant-config.js';
import { resolveIssuerMetadata } from './discovery.js';
import { verifyToken } from './token-verifier.js';
import { createMissingTokenError } from './errors.js';

/**
 * Validator bound to one tenant policy, holding its own signing-key snapshot.
 */
export interface B2cTokenValidator {
  /** Tenant configuration, frozen at construction */
  readonly tenant: TenantConfig;

  /** Issuer metadata resolved at construction */
  readonly metadata: IssuerMetadata;

  /**
   * Validates an access token against the active key snapshot.
   * Synchronous; performs no I/O.
   *
   * On `need-key-refresh`, call `refreshValidationKeys()` and validate once more.
   * A second miss should be treated as invalid.
   *
   * @param token - The compact access token
   * @returns The validation outcome, or MISSING_TOKEN when no token was given
   */
  readonly validateAccessToken: (token: string | undefined) => Result<ValidationResult, VerifierError>;

  /**
   * Fetches the signing keys again and replaces the snapshot on success.
   * Concurrent calls share one fetch.
   */
  readonly refreshValidationKeys: () => Promise<Result<void, KeyFetchError>>;

  /**
   * Cancels an in-flight refresh; its waiters receive REFRESH_CANCELLED.
   * @returns true if a refresh was in flight
   */
  readonly cancelRefresh: (reason?: unknown) => boolean;

  /** Returns the active key snapshot */
  readonly currentKeySet: () => KeySet;
}

/**
 * Creates a token validator for a B2C tenant policy.
 *
 * Resolves the tenant's discovery document and fetches its signing keys
 * before returning; if either step fails no validator is created.
 *
 * @param config - Tenant, policy, audiences and validation settings
 * @param options - Optional HTTP client, pino logger and clock
 * @returns Result with a ready validator or the construction error
 *
 * @example
 * ```typescript
 * const created = await createB2cTokenValidator({
 *   tenantName: 'contoso',
 *   policyName: 'B2C_1_signupsignin',
 *   allowedAudiences: ['11111111-2222-3333-4444-555555555555'],
 * });
 *
 * if (created.isErr()) {
 *   throw new Error(created.error.message);
 * }
 *
 * const validator = created.value;
 * let outcome = validator.validateAccessToken(token);
 *
 * if (outcome.isOk() && outcome.value.status === 'need-key-refresh') {
 *   await validator.refreshValidationKeys();
 *   outcome = validator.validateAccessToken(token);
 * }
 * ```
 */
export const createB2cTokenValidator = async (
  config: B2cValidatorConfig,
  options: B2cValidatorOptions = {}
): Promise<Result<B2cTokenValidator, ConstructionError>> => {
  const {
    httpClient = createFetchClient(),
    logger = createSilentLogger(),
    now = Date.now,
  } = options;
  const { clockToleranceSeconds = 0, minRefreshIntervalMs = 0 } = config;

  const tenantResult = createTenantConfig(config);
  if (tenantResult.isErr()) {
    return err(tenantResult.error);
  }
  const tenant = tenantResult.value;
  const log = logger.child({ tenant: tenant.tenantName, policy: tenant.policyName });

  const metadataResult = await resolveIssuerMetadata(httpClient, tenant, { logger: log });
  if (metadataResult.isErr()) {
    log.error({ err: metadataResult.error }, 'issuer discovery failed');
    return err(metadataResult.error);
  }
  const metadata = Object.freeze(metadataResult.value);

  const initialKeys = await fetchKeySet(httpClient, metadata.jwksUri, { now, logger: log });
  if (initialKeys.isErr()) {
    log.error({ err: initialKeys.error }, 'initial signing key fetch failed');
    return err(initialKeys.error);
  }

  const keyStore = createKeyStore({
    initial: initialKeys.value,
    fetchKeySet: (signal) =>
      fetchKeySet(httpClient, metadata.jwksUri, { signal, now, logger: log }),
    minRefreshIntervalMs,
    logger: log,
    now,
  });

  log.info(
    { issuer: metadata.issuer, keyCount: initialKeys.value.keys.size },
    'token validator ready'
  );

  const validateAccessToken = (
    token: string | undefined
  ): Result<ValidationResult, VerifierError> => {
    if (token === undefined || token.trim().length === 0) {
      return err(createMissingTokenError());
    }

    const result = verifyToken(token.trim(), keyStore.current(), metadata.issuer, tenant, {
      now,
      clockToleranceSeconds,
    });

    if (result.status === 'need-key-refresh') {
      log.debug({ kid: result.kid }, 'token signed with unknown key');
    } else if (result.status === 'invalid') {
      log.debug({ reason: result.reason }, result.message);
    }

    return ok(result);
  };

  return ok({
    tenant,
    metadata,
    validateAccessToken,
    refreshValidationKeys: keyStore.refresh,
    cancelRefresh: keyStore.cancel,
    currentKeySet: keyStore.current,
  });
};
