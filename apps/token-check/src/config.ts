/**
 * Token Check Configuration Module
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { B2cValidatorConfig } from 'b2c-token-validator';

/**
 * Configuration for the token check command.
 */
export interface TokenCheckConfig {
  /** Validator settings for the tenant policy */
  readonly validator: B2cValidatorConfig;
  /** pino log level */
  readonly logLevel: string;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .optional();

const envSchema = z.object({
  B2C_TENANT_NAME: z.string().trim().min(1, 'must not be empty'),
  B2C_POLICY_NAME: z.string().trim().min(1, 'must not be empty'),
  B2C_ALLOWED_AUDIENCES: optionalString.transform((value) =>
    value
      ?.split(',')
      .map((audience) => audience.trim())
      .filter((audience) => audience.length > 0)
  ),
  B2C_AUTHORITY_HOST: optionalString,
  B2C_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().min(0).max(300).default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Creates the token check configuration from environment variables.
 *
 * Required env vars:
 * - B2C_TENANT_NAME: Tenant name (e.g., "contoso")
 * - B2C_POLICY_NAME: User flow (e.g., "B2C_1_signupsignin")
 *
 * Optional env vars:
 * - B2C_ALLOWED_AUDIENCES: Comma-separated application IDs (default: audience not checked)
 * - B2C_AUTHORITY_HOST: Custom domain (default: {tenant}.b2clogin.com)
 * - B2C_CLOCK_TOLERANCE_SECONDS: Leeway for exp/nbf, 0-300 (default: 0)
 * - LOG_LEVEL: pino level (default: info)
 *
 * @throws Error listing every invalid variable
 */
export function createCheckConfig(env: NodeJS.ProcessEnv = process.env): TokenCheckConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const name = issue.path.join('.');
      return issue.message === 'Required' ? `${name} is required` : `${name}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const audiences = parsed.data.B2C_ALLOWED_AUDIENCES;

  return {
    validator: {
      tenantName: parsed.data.B2C_TENANT_NAME,
      policyName: parsed.data.B2C_POLICY_NAME,
      allowedAudiences: audiences !== undefined && audiences.length > 0 ? audiences : undefined,
      authorityHost: parsed.data.B2C_AUTHORITY_HOST,
      clockToleranceSeconds: parsed.data.B2C_CLOCK_TOLERANCE_SECONDS,
    },
    logLevel: parsed.data.LOG_LEVEL,
  };
}
