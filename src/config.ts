/**
 * Environment configuration for the command-line tool.
 */

import { z } from 'zod';
import { DEFAULT_SCAN_TIMEOUT_MS } from './discovery';
import { ConfigurationError } from './exceptions';
import { TransferStateMachine } from './transfer/state-machine';

// Unset and empty variables both fall back to the defaults
const blankAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const envSchema = z.object({
  BADGE_ADDRESS: z.preprocess(blankAsUnset, z.string().trim().min(1).optional()),
  BADGE_ACK_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(TransferStateMachine.DEFAULT_ACK_TIMEOUT_MS)
  ),
  BADGE_SCAN_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(DEFAULT_SCAN_TIMEOUT_MS)
  ),
});

export interface BadgeConfig {
  /** Badge MAC address or peripheral id */
  address?: string;
  ackTimeoutMs: number;
  scanTimeoutMs: number;
}

/**
 * Read settings from the environment.
 *
 * @throws {ConfigurationError} If a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BadgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${problems.join('; ')}`);
  }

  return {
    address: parsed.data.BADGE_ADDRESS,
    ackTimeoutMs: parsed.data.BADGE_ACK_TIMEOUT_MS,
    scanTimeoutMs: parsed.data.BADGE_SCAN_TIMEOUT_MS,
  };
}
