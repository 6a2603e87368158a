/**
 * Conversion between relay entries and native store documents.
 *
 * @module relay/entry-codec
 */
import { RelayEntrySchema, type Instant, type RelayEntry } from '@roomrelay/shared/entry-schemas';
import type { DocumentData, StoredDocument } from '@roomrelay/db';
import { DecodeError } from './errors.js';
import { normalizeRoomCode } from './room-code.js';

export type Clock = () => Instant;

/**
 * Encodes and decodes relay entries.
 *
 * Timestamps handed out by one codec are strictly increasing: a reader treats
 * an entry at its watermark as already seen, so two entries from the same
 * writer must never share an instant.
 */
export class EntryCodec {
  private last = Number.NEGATIVE_INFINITY;

  constructor(private readonly clock: Clock = Date.now) {}

  /** Current instant, bumped past the previous one when the clock has not moved. */
  now(): Instant {
    const current = this.clock();
    const next = current > this.last ? current : this.last + 1;
    this.last = next;
    return next;
  }

  /** Build an entry for `roomCode` stamped with the current time. */
  encode(roomCode: string, payload: string): RelayEntry {
    return { roomCode: normalizeRoomCode(roomCode), timestamp: this.now(), payload };
  }

  /**
   * Project a store document onto the entry shape.
   *
   * @throws DecodeError if a field is missing or has the wrong type
   */
  decode(doc: StoredDocument): RelayEntry {
    const result = RelayEntrySchema.safeParse(doc.data);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new DecodeError(`Document ${doc.id} is not a relay entry (${detail})`, doc.id, {
        cause: result.error,
      });
    }
    return result.data;
  }

  toDocument(entry: RelayEntry): DocumentData {
    return { roomCode: entry.roomCode, timestamp: entry.timestamp, payload: entry.payload };
  }
}
