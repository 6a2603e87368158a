import { z } from 'zod';

/** Letters used for generated room codes unless configured otherwise. */
export const DEFAULT_ROOM_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/** Length of generated room codes unless configured otherwise. */
export const DEFAULT_ROOM_CODE_LENGTH = 4;

/** Top-level collection the relay reads and writes. */
export const DEFAULT_COLLECTION = 'Messages';

/** Interval between fault-monitor ticks. */
export const DEFAULT_TICK_INTERVAL_MS = 100;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const RelayConfigSchema = z.object({
  collection: z.string().min(1).default(DEFAULT_COLLECTION),
  /** Fixed room code; `null` generates one when the relay starts. */
  roomCode: z.string().trim().min(1).nullable().default(null),
  roomCodeAlphabet: z.string().min(1).default(DEFAULT_ROOM_CODE_ALPHABET),
  roomCodeLength: z.number().int().min(1).max(32).default(DEFAULT_ROOM_CODE_LENGTH),
  verboseLogging: z.boolean().default(false),
  /** Overrides the level implied by `verboseLogging`. */
  logLevel: LogLevelSchema.optional(),
  /** `0` disables the internal ticker; the embedder then calls `tick()` itself. */
  tickIntervalMs: z.number().int().min(0).default(DEFAULT_TICK_INTERVAL_MS),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/** Input accepted before defaults are applied. */
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;

/** Defaults extracted from the schema. */
export const RELAY_CONFIG_DEFAULTS: RelayConfig = RelayConfigSchema.parse({});
