/**
 * Zod schemas for relay entries.
 *
 * An entry is the unit of relay traffic: one payload written into one room
 * at one instant. The same three fields are used as the native document
 * shape in the document store, so writers in any language only need to
 * agree on these names.
 *
 * @module shared/entry-schemas
 */
import { z } from 'zod';

// === Field names ===

/** Native document field holding the room code. */
export const ROOM_CODE_FIELD = 'roomCode' satisfies keyof RelayEntry;

/** Native document field holding the write instant (Unix ms). */
export const TIMESTAMP_FIELD = 'timestamp' satisfies keyof RelayEntry;

/** Native document field holding the application payload. */
export const PAYLOAD_FIELD = 'payload' satisfies keyof RelayEntry;

// === Schemas ===

/** A Unix epoch instant in milliseconds. */
export const InstantSchema = z.number().int();

export type Instant = z.infer<typeof InstantSchema>;

export const RelayEntrySchema = z.object({
  roomCode: z.string().min(1),
  timestamp: InstantSchema,
  payload: z.string(),
});

export type RelayEntry = z.infer<typeof RelayEntrySchema>;
