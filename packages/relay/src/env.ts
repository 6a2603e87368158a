import { z } from 'zod';
import {
  LogLevelSchema,
  RelayConfigSchema,
  type RelayConfig,
  type RelayConfigInput,
} from '@roomrelay/shared/config-schema';

// Only the variables the relay reads. Blank values count as unset.
const relayEnvSchema = z.object({
  ROOMRELAY_COLLECTION: z.string().trim().optional(),
  ROOMRELAY_ROOM_CODE: z.string().trim().optional(),
  ROOMRELAY_VERBOSE: z.enum(['true', 'false', '1', '0', '']).optional(),
  ROOMRELAY_LOG_LEVEL: z.union([LogLevelSchema, z.literal('')]).optional(),
  ROOMRELAY_TICK_INTERVAL_MS: z
    .string()
    .trim()
    .regex(/^\d*$/, 'must be a non-negative integer')
    .optional(),
});

export type RelayEnv = z.infer<typeof relayEnvSchema>;

/**
 * Parse the relay's environment variables.
 *
 * @throws ZodError when a variable holds an invalid value
 */
export function parseRelayEnv(source: NodeJS.ProcessEnv = process.env): RelayEnv {
  return relayEnvSchema.parse(source);
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Resolve the effective relay configuration.
 *
 * Precedence: explicit overrides > environment variables > schema defaults.
 */
export function resolveRelayConfig(
  overrides: RelayConfigInput = {},
  source: NodeJS.ProcessEnv = process.env,
): RelayConfig {
  const env = parseRelayEnv(source);
  const verbose = present(env.ROOMRELAY_VERBOSE);
  const logLevel = present(env.ROOMRELAY_LOG_LEVEL);
  const tick = present(env.ROOMRELAY_TICK_INTERVAL_MS);

  return RelayConfigSchema.parse({
    collection: overrides.collection ?? present(env.ROOMRELAY_COLLECTION),
    roomCode:
      overrides.roomCode !== undefined ? overrides.roomCode : present(env.ROOMRELAY_ROOM_CODE),
    roomCodeAlphabet: overrides.roomCodeAlphabet,
    roomCodeLength: overrides.roomCodeLength,
    verboseLogging:
      overrides.verboseLogging ??
      (verbose === undefined ? undefined : verbose === 'true' || verbose === '1'),
    logLevel: overrides.logLevel ?? (logLevel === undefined ? undefined : LogLevelSchema.parse(logLevel)),
    tickIntervalMs: overrides.tickIntervalMs ?? (tick === undefined ? undefined : Number(tick)),
  });
}
