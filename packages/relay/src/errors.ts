/**
 * Error kinds raised inside the relay.
 *
 * None of these reach the embedder as a thrown error: each is caught next to
 * where it originates, logged, and turned into a state transition or a
 * `fault` event.
 *
 * @module relay/errors
 */

export type RelayErrorCode = 'DECODE_ERROR' | 'QUERY_FAULT' | 'INDEX_REQUIRED' | 'CONNECT_FAULT';

/** Base class carrying a machine-readable `code`. */
export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: RelayErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RelayError';
  }
}

/** A store document could not be read as a relay entry. The entry is skipped. */
export class DecodeError extends RelayError {
  constructor(
    message: string,
    public readonly documentId: string | null = null,
    options?: ErrorOptions,
  ) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}

/** The live query terminated with an error. */
export class QueryFault extends RelayError {
  constructor(message: string, options?: ErrorOptions, code: RelayErrorCode = 'QUERY_FAULT') {
    super(message, code, options);
    this.name = 'QueryFault';
  }
}

/** The store refused the live query until an operator creates an index. */
export class IndexRequiredFault extends QueryFault {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, 'INDEX_REQUIRED');
    this.name = 'IndexRequiredFault';
  }
}

/** Connecting or configuring the store failed during start-up. */
export class ConnectFault extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONNECT_FAULT', options);
    this.name = 'ConnectFault';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
