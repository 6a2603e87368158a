import type { ConsolaInstance } from 'consola';
import type { DocumentCollection } from '@roomrelay/db';
import { EntryCodec } from './entry-codec.js';
import { logger as defaultLogger } from './logger.js';

export interface AppendMessageOptions {
  codec?: EntryCodec;
  logger?: ConsolaInstance;
}

const sharedCodec = new EntryCodec();

/**
 * Append one message to a room.
 *
 * Stamps the entry with the current time and normalises the room code.
 * Failures are logged and reported as `null` rather than thrown.
 *
 * @returns The new document id, or `null` if the append failed
 */
export async function appendMessage(
  collection: DocumentCollection,
  roomCode: string,
  payload: string,
  options: AppendMessageOptions = {},
): Promise<string | null> {
  const codec = options.codec ?? sharedCodec;
  const logger = options.logger ?? defaultLogger;
  try {
    const entry = codec.encode(roomCode, payload);
    const id = await collection.add(codec.toDocument(entry));
    logger.debug(`[appendMessage] Added doc [ ${id} ] to room ${entry.roomCode}`);
    return id;
  } catch (err) {
    logger.error('[appendMessage] Failed to append message:', err);
    return null;
  }
}
