/**
 * Room code generation and normalisation.
 *
 * Codes are short and human-typeable. They come from `Math.random`, so they
 * are guessable and two rooms can collide; neither is checked.
 *
 * @module relay/room-code
 */
import {
  DEFAULT_ROOM_CODE_ALPHABET,
  DEFAULT_ROOM_CODE_LENGTH,
} from '@roomrelay/shared/config-schema';

export interface RoomCodeOptions {
  /** @default 'ABCDEFGHIJKLMNOPQRSTUVWXYZ' */
  alphabet?: string;
  /** @default 4 */
  length?: number;
  /** Uniform random source in `[0, 1)`. @default Math.random */
  random?: () => number;
}

/** Generates fixed-length room codes drawn uniformly from an alphabet. */
export class RoomCodeGenerator {
  private readonly alphabet: string;
  private readonly length: number;
  private readonly random: () => number;

  constructor(options: RoomCodeOptions = {}) {
    this.alphabet = options.alphabet ?? DEFAULT_ROOM_CODE_ALPHABET;
    this.length = options.length ?? DEFAULT_ROOM_CODE_LENGTH;
    this.random = options.random ?? Math.random;
    if (this.alphabet.length === 0) throw new Error('Room code alphabet must not be empty');
    if (!Number.isInteger(this.length) || this.length < 1) {
      throw new Error(`Invalid room code length: ${this.length}`);
    }
  }

  generate(): string {
    let code = '';
    for (let i = 0; i < this.length; i++) {
      const index = Math.min(Math.floor(this.random() * this.alphabet.length), this.alphabet.length - 1);
      code += this.alphabet.charAt(index);
    }
    return code;
  }
}

/**
 * Canonical form of a room code: trimmed and upper-cased.
 *
 * Filtering is an exact string match, so writers and readers must both
 * normalise.
 *
 * @throws If the code is blank
 */
export function normalizeRoomCode(code: string): string {
  const normalized = code.trim().toUpperCase();
  if (normalized.length === 0) {
    throw new Error('Room code must not be empty');
  }
  return normalized;
}
