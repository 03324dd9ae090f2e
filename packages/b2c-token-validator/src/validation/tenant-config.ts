import { ok, err, type Result } from 'neverthrow';
import type { TenantConfig, TenantConfigError } from '../types.js';
import { createTenantConfigError } from './errors.js';

/**
 * Input accepted by `createTenantConfig`.
 */
export interface TenantConfigInput {
  readonly tenantName: string;
  readonly policyName: string;
  readonly allowedAudiences?: readonly string[] | undefined;
  readonly authorityHost?: string | undefined;
}

/**
 * Validates tenant input and returns a frozen TenantConfig.
 *
 * An audience list, when given, must hold at least one non-empty entry;
 * pass `undefined` to disable audience checking instead.
 */
export const createTenantConfig = (
  input: TenantConfigInput
): Result<TenantConfig, TenantConfigError> => {
  const tenantName = input.tenantName.trim();
  const policyName = input.policyName.trim();

  if (tenantName.length === 0) {
    return err(createTenantConfigError('Tenant name must not be empty'));
  }
  if (policyName.length === 0) {
    return err(createTenantConfigError('Policy name must not be empty'));
  }

  let allowedAudiences: readonly string[] | undefined;
  if (input.allowedAudiences !== undefined) {
    if (input.allowedAudiences.length === 0) {
      return err(createTenantConfigError('Allowed audiences must not be empty when provided'));
    }
    if (input.allowedAudiences.some((audience) => audience.length === 0)) {
      return err(createTenantConfigError('Allowed audiences must not contain empty values'));
    }
    allowedAudiences = Object.freeze([...new Set(input.allowedAudiences)]);
  }

  const authorityHost = input.authorityHost?.trim();
  if (authorityHost?.length === 0) {
    return err(createTenantConfigError('Authority host must not be empty when provided'));
  }

  return ok(
    Object.freeze({
      tenantName,
      policyName,
      allowedAudiences,
      authorityHost,
    })
  );
};
