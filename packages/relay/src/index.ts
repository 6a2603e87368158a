/**
 * @roomrelay/relay -- Room-scoped message relay over a live document store.
 *
 * Readers listen to one room from a moving timestamp watermark; writers
 * append entries tagged with the room code. Every reader in a room sees every
 * entry; there is no acknowledgement or single-consumer delivery.
 *
 * @module relay
 */

// Main entry point
export { RelayService } from './relay-service.js';
export type { RelayServiceOptions } from './relay-service.js';

// Write path
export { appendMessage } from './append-message.js';
export type { AppendMessageOptions } from './append-message.js';

// Sub-modules (for advanced usage)
export { WatermarkSubscription, roomQuery } from './watermark-subscription.js';
export type { WatermarkSubscriptionOptions } from './watermark-subscription.js';
export { SubscriptionHandle } from './subscription-handle.js';
export { FaultMonitor, classifyQueryError } from './fault-monitor.js';
export { EntryCodec } from './entry-codec.js';
export type { Clock } from './entry-codec.js';
export { RoomCodeGenerator, normalizeRoomCode } from './room-code.js';
export type { RoomCodeOptions } from './room-code.js';

// Errors
export {
  RelayError,
  DecodeError,
  QueryFault,
  IndexRequiredFault,
  ConnectFault,
} from './errors.js';
export type { RelayErrorCode } from './errors.js';

// Configuration and logging
export { resolveRelayConfig, parseRelayEnv } from './env.js';
export type { RelayEnv } from './env.js';
export { logger, createRelayLogger, resolveLogLevel } from './logger.js';
export type { RelayLoggerOptions } from './logger.js';

// Types
export type {
  ReadyHandler,
  MessageHandler,
  FaultHandler,
  Unsubscribe,
  RelayState,
  RelayFault,
  HandleStatus,
} from './types.js';
