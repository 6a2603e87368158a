/**
 * Shared type definitions for the @roomrelay/relay package.
 *
 * @module relay/types
 */
import type { ConnectFault, IndexRequiredFault, QueryFault } from './errors.js';

export type ReadyHandler = (roomCode: string) => void;
export type MessageHandler = (payload: string) => void;
export type FaultHandler = (fault: RelayFault) => void;
export type Unsubscribe = () => void;

/** Lifecycle state of a {@link RelayService}. */
export type RelayState =
  | 'uninitialized'
  | 'connecting'
  | 'ready'
  | 'faulted'
  | 'shutting-down'
  | 'terminated';

/** Status of one live query handle. */
export type HandleStatus = 'active' | 'completed' | 'faulted';

/** Why the relay stopped delivering messages. */
export type RelayFault =
  /** The live query ended without an error, which never happens in normal operation. */
  | { kind: 'completed' }
  | { kind: 'query-fault'; error: QueryFault }
  | { kind: 'index-required'; error: IndexRequiredFault }
  | { kind: 'connect-fault'; error: ConnectFault };
