#!/usr/bin/env node

/**
 * Token Check
 *
 * Validates one access token against a B2C tenant policy:
 * 1. Resolves the policy's issuer and signing keys
 * 2. Validates the token, refreshing keys once if it names an unknown key
 * 3. Prints the projected claims, or the rejection, as JSON on stdout
 *
 * Usage: token-check <access-token>  (or set B2C_ACCESS_TOKEN)
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { pino, destination } from 'pino';
import { createB2cTokenValidator } from 'b2c-token-validator';
import { createCheckConfig } from './config.js';
import { checkToken } from './check.js';

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const config = createCheckConfig();
  const logger = pino({ name: 'token-check', level: config.logLevel }, destination(2));

  const created = await createB2cTokenValidator(config.validator, { logger });
  if (created.isErr()) {
    logger.error({ code: created.error.code }, created.error.message);
    process.exitCode = 2;
    return;
  }

  const token = process.argv[2] ?? process.env['B2C_ACCESS_TOKEN'];
  const outcome = await checkToken(created.value, token, logger);

  if (outcome.isErr()) {
    process.stdout.write(`${JSON.stringify({ valid: false, ...outcome.error }, null, 2)}\n`);
    process.exitCode = 1;
    return;
  }

  process.stdout.write(`${JSON.stringify({ valid: true, claims: outcome.value }, null, 2)}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`[token-check] Fatal error: ${String(error)}\n`);
  process.exit(1);
});
