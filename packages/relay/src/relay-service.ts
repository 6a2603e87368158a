/**
 * Outward-facing relay for one room.
 *
 * Owns the store connection and the room's watermark subscription, drives
 * the fault monitor from a ticker, and exposes `ready`, `message` and
 * `fault` events to the embedder.
 *
 * Lifecycle:
 * `uninitialized -> connecting -> ready -> (faulted | shutting-down) -> terminated`.
 * A fault is never recovered automatically; calling {@link RelayService.start}
 * again tears everything down and connects afresh.
 *
 * @module relay/relay-service
 */
import type { ConsolaInstance } from 'consola';
import type { DocumentStore, StoreConnector } from '@roomrelay/db';
import type { RelayConfig, RelayConfigInput } from '@roomrelay/shared/config-schema';
import { RelayConfigSchema } from '@roomrelay/shared/config-schema';
import type { Instant } from '@roomrelay/shared/entry-schemas';
import { EntryCodec, type Clock } from './entry-codec.js';
import { ConnectFault, errorMessage } from './errors.js';
import { FaultMonitor } from './fault-monitor.js';
import { createRelayLogger } from './logger.js';
import { ObserverList } from './observer-list.js';
import { RoomCodeGenerator, normalizeRoomCode } from './room-code.js';
import type {
  FaultHandler,
  MessageHandler,
  ReadyHandler,
  RelayFault,
  RelayState,
  Unsubscribe,
} from './types.js';
import { WatermarkSubscription } from './watermark-subscription.js';

export interface RelayServiceOptions {
  /** Opens a fresh store connection on every start. */
  connect: StoreConnector;
  config?: RelayConfigInput;
  /** Defaults to a relay logger at the configured level. */
  logger?: ConsolaInstance;
  /** Source of "now" for the initial watermark. @default Date.now */
  clock?: Clock;
  /** Random source for generated room codes. @default Math.random */
  random?: () => number;
}

/**
 * Relay service for one room.
 *
 * @example
 * ```ts
 * const db = new Database('/var/lib/relay/relay.db');
 * const relay = new RelayService({
 *   connect: () => new SqliteDocumentStore({ database: db }),
 *   config: { verboseLogging: true },
 * });
 * relay.onReady((roomCode) => console.log(`Join room ${roomCode}`));
 * relay.onMessage((payload) => console.log('Received:', payload));
 * relay.onFault((fault) => console.error('Relay stopped:', fault.kind));
 * await relay.start();
 * // ...
 * await relay.shutdown();
 * ```
 */
export class RelayService {
  readonly config: RelayConfig;
  private readonly connector: StoreConnector;
  private readonly logger: ConsolaInstance;
  private readonly clock: Clock;
  private readonly codec: EntryCodec;
  private readonly roomCodes: RoomCodeGenerator;
  private readonly monitor: FaultMonitor;
  private readonly readyObservers: ObserverList<[string]>;
  private readonly messageObservers: ObserverList<[string]>;
  private readonly faultObservers: ObserverList<[RelayFault]>;
  private currentState: RelayState = 'uninitialized';
  private resolvedRoomCode: string | null;
  private store: DocumentStore | null = null;
  private subscription: WatermarkSubscription | null = null;
  private ticker: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private lifecycle: Promise<void> = Promise.resolve();

  constructor(options: RelayServiceOptions) {
    this.config = RelayConfigSchema.parse(options.config ?? {});
    this.connector = options.connect;
    this.logger =
      options.logger ??
      createRelayLogger({ verbose: this.config.verboseLogging, level: this.config.logLevel });
    this.clock = options.clock ?? Date.now;
    this.codec = new EntryCodec(this.clock);
    this.roomCodes = new RoomCodeGenerator({
      alphabet: this.config.roomCodeAlphabet,
      length: this.config.roomCodeLength,
      random: options.random,
    });
    this.monitor = new FaultMonitor(this.logger);
    this.readyObservers = new ObserverList('RelayService', 'ready', this.logger);
    this.messageObservers = new ObserverList('RelayService', 'message', this.logger);
    this.faultObservers = new ObserverList('RelayService', 'fault', this.logger);
    this.resolvedRoomCode =
      this.config.roomCode === null ? null : normalizeRoomCode(this.config.roomCode);
  }

  // --- State ---

  get state(): RelayState {
    return this.currentState;
  }

  /** The room this relay listens to. Generated on first access when not configured. */
  get roomCode(): string {
    if (this.resolvedRoomCode === null) {
      this.resolvedRoomCode = this.roomCodes.generate();
    }
    return this.resolvedRoomCode;
  }

  /** Current watermark of the live subscription, or `null` before the first start. */
  get watermark(): Instant | null {
    return this.subscription?.watermark ?? null;
  }

  // --- Events ---

  /** Fired once per successful start, with the room code. */
  onReady(handler: ReadyHandler): Unsubscribe {
    return this.readyObservers.add(handler);
  }

  /** Fired for every accepted entry, with its payload. */
  onMessage(handler: MessageHandler): Unsubscribe {
    return this.messageObservers.add(handler);
  }

  /** Fired when the relay stops delivering because of a fault. */
  onFault(handler: FaultHandler): Unsubscribe {
    return this.faultObservers.add(handler);
  }

  // --- Lifecycle ---

  /**
   * Connect (or reconnect) and start listening from now.
   *
   * Any previous connection is torn down first. A failure to connect is
   * logged and reported through `fault`; it does not reject.
   *
   * @throws If the service has been shut down
   */
  start(): Promise<void> {
    return this.serialize(async () => {
      if (this.currentState === 'shutting-down' || this.currentState === 'terminated') {
        throw new Error('RelayService has been shut down');
      }
      this.setState('connecting');
      await this.teardown();

      const roomCode = this.roomCode;
      try {
        const store = await this.connector();
        this.store = store;
        // The store is a live transport only; never serve a stale local snapshot.
        store.configure({ persistenceEnabled: false });
        const subscription = new WatermarkSubscription({
          collection: store.collection(this.config.collection),
          roomCode,
          codec: this.codec,
          logger: this.logger,
          onEntry: (entry) => this.messageObservers.notify(entry.payload),
        });
        this.subscription = subscription;
        await subscription.start(this.clock());
      } catch (err) {
        const error = new ConnectFault(`Failed to connect relay: ${errorMessage(err)}`, { cause: err });
        this.logger.error('[RelayService] Failed to connect:', err);
        this.setState('faulted');
        this.faultObservers.notify({ kind: 'connect-fault', error });
        return;
      }

      this.logger.debug(`[RelayService] Ready code: [${roomCode}]`);
      this.setState('ready');
      this.startTicker();
      this.readyObservers.notify(roomCode);
    });
  }

  /**
   * Inspect the live query once. Called by the internal ticker, or by the
   * embedder's own loop when `tickIntervalMs` is `0`.
   */
  async tick(): Promise<void> {
    const subscription = this.subscription;
    if (this.currentState !== 'ready' || !subscription || this.ticking) return;
    this.ticking = true;
    try {
      const fault = await this.monitor.check(subscription);
      if (fault && this.currentState === 'ready' && this.subscription === subscription) {
        this.stopTicker();
        this.setState('faulted');
        this.faultObservers.notify(fault);
      }
    } finally {
      this.ticking = false;
    }
  }

  /** Stop listening and release the store. Idempotent. */
  shutdown(): Promise<void> {
    return this.serialize(async () => {
      if (this.currentState === 'shutting-down' || this.currentState === 'terminated') return;
      this.setState('shutting-down');
      await this.teardown();
      this.setState('terminated');
    });
  }

  // --- Internals ---

  /** Unsubscribe, terminate the store, clear its cache, and release it. */
  private async teardown(): Promise<void> {
    this.stopTicker();

    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) await subscription.stop();

    const store = this.store;
    this.store = null;
    if (store) {
      try {
        await store.terminate();
        await store.clearPersistence();
      } catch (err) {
        this.logger.warn('[RelayService] Failed to release previous store:', err);
      }
    }
  }

  private startTicker(): void {
    if (this.config.tickIntervalMs === 0) return;
    this.ticker = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.logger.error('[RelayService] Tick failed:', err);
      });
    }, this.config.tickIntervalMs);
  }

  private stopTicker(): void {
    if (this.ticker) clearInterval(this.ticker);
    this.ticker = null;
  }

  private setState(state: RelayState): void {
    if (state === this.currentState) return;
    this.logger.debug(`[RelayService] ${this.currentState} -> ${state}`);
    this.currentState = state;
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.lifecycle.then(task);
    this.lifecycle = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
