import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { ClaimSet } from '../types.js';

/**
 * Claims could not be converted into the caller's structure.
 */
export interface ClaimProjectionError {
  readonly code: 'CLAIM_PROJECTION_ERROR';
  readonly message: string;
  readonly issues: readonly z.ZodIssue[];
}

/**
 * Converts a validated claim set into a caller-defined structure.
 *
 * @param claims - Claims from a `valid` result
 * @param schema - zod schema describing (and optionally renaming) the claims
 * @returns Result with the projected value or the schema issues
 *
 * @example
 * ```typescript
 * const schema = z
 *   .object({ oid: z.string(), emails: z.array(z.string()) })
 *   .transform((c) => ({ userId: c.oid, email: c.emails[0] }));
 *
 * const user = projectClaims(result.claims, schema);
 * ```
 */
export const projectClaims = <S extends z.ZodTypeAny>(
  claims: ClaimSet,
  schema: S
): Result<z.output<S>, ClaimProjectionError> => {
  const parsed = schema.safeParse(claims);

  if (!parsed.success) {
    return err({
      code: 'CLAIM_PROJECTION_ERROR',
      message: parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
      issues: parsed.error.issues,
    });
  }

  return ok(parsed.data);
};

const secondsToDate = (seconds: number): Date => new Date(seconds * 1000);

/**
 * Common B2C access token claims under descriptive names.
 */
export const b2cAccessTokenClaimsSchema = z
  .object({
    sub: z.string(),
    iss: z.string(),
    aud: z.union([z.string(), z.array(z.string())]),
    exp: z.number(),
    nbf: z.number().optional(),
    iat: z.number().optional(),
    oid: z.string().optional(),
    tid: z.string().optional(),
    tfp: z.string().optional(),
    acr: z.string().optional(),
    scp: z.string().optional(),
    azp: z.string().optional(),
    name: z.string().optional(),
    emails: z.array(z.string()).optional(),
  })
  .transform((claims) => ({
    subject: claims.sub,
    issuer: claims.iss,
    audiences: typeof claims.aud === 'string' ? [claims.aud] : claims.aud,
    expiresAt: secondsToDate(claims.exp),
    notBefore: claims.nbf !== undefined ? secondsToDate(claims.nbf) : undefined,
    issuedAt: claims.iat !== undefined ? secondsToDate(claims.iat) : undefined,
    objectId: claims.oid,
    tenantId: claims.tid,
    policy: claims.tfp ?? claims.acr,
    scopes: claims.scp?.split(' ').filter((scope) => scope.length > 0) ?? [],
    authorizedParty: claims.azp,
    name: claims.name,
    emails: claims.emails ?? [],
  }));

export type B2cAccessTokenClaims = z.output<typeof b2cAccessTokenClaimsSchema>;
