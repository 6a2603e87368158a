/**
 * Watermark-driven live subscription to one room.
 *
 * Keeps exactly one live query open for `roomCode == R AND timestamp >= W`,
 * ordered by timestamp. Entries at or below the watermark `W` are dropped as
 * already seen; when a batch carries newer entries the query is closed and
 * reopened from the newest timestamp, since a live query's bound is fixed
 * when it is opened. The bound is inclusive, so every reopen re-delivers the
 * entry sitting exactly on the new watermark and the stale check absorbs it.
 *
 * @module relay/watermark-subscription
 */
import type { ConsolaInstance } from 'consola';
import type { DocumentCollection, QuerySnapshot, QuerySpec } from '@roomrelay/db';
import {
  ROOM_CODE_FIELD,
  TIMESTAMP_FIELD,
  type Instant,
  type RelayEntry,
} from '@roomrelay/shared/entry-schemas';
import { EntryCodec } from './entry-codec.js';
import { DecodeError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import { SubscriptionHandle } from './subscription-handle.js';

export interface WatermarkSubscriptionOptions {
  collection: DocumentCollection;
  /** Normalised room code to listen to. */
  roomCode: string;
  /** Receives every accepted entry, in delivery order. */
  onEntry: (entry: RelayEntry) => void;
  codec?: EntryCodec;
  logger?: ConsolaInstance;
}

/** Live query definition for one room from a watermark. */
export function roomQuery(roomCode: string, watermark: Instant): QuerySpec {
  return {
    where: [
      { field: ROOM_CODE_FIELD, op: '==', value: roomCode },
      { field: TIMESTAMP_FIELD, op: '>=', value: watermark },
    ],
    orderBy: TIMESTAMP_FIELD,
  };
}

/**
 * Owns the watermark and the current live query handle.
 *
 * `start`, `stop` and batch processing (including its restart) run one at a
 * time through an internal promise chain, so a restart never overlaps a stop
 * and two handles are never open at once.
 */
export class WatermarkSubscription {
  readonly roomCode: string;
  private readonly collection: DocumentCollection;
  private readonly onEntry: (entry: RelayEntry) => void;
  private readonly codec: EntryCodec;
  private readonly logger: ConsolaInstance;
  private currentWatermark: Instant | null = null;
  private currentHandle: SubscriptionHandle | null = null;
  private generation = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(options: WatermarkSubscriptionOptions) {
    this.collection = options.collection;
    this.roomCode = options.roomCode;
    this.onEntry = options.onEntry;
    this.codec = options.codec ?? new EntryCodec();
    this.logger = options.logger ?? defaultLogger;
  }

  /** Current watermark, or `null` before the first `start`. */
  get watermark(): Instant | null {
    return this.currentWatermark;
  }

  /** The open handle, or `null` when stopped. */
  get handle(): SubscriptionHandle | null {
    return this.currentHandle;
  }

  get collectionName(): string {
    return this.collection.name;
  }

  /**
   * Open the live query from `initialWatermark`.
   *
   * The watermark never moves backwards: restarting after a `stop` with an
   * older instant keeps the newer one.
   *
   * @throws If the subscription is already started
   */
  start(initialWatermark: Instant): Promise<void> {
    return this.serialize(async () => {
      if (this.currentHandle) {
        throw new Error('WatermarkSubscription is already started');
      }
      this.currentWatermark =
        this.currentWatermark === null
          ? initialWatermark
          : Math.max(this.currentWatermark, initialWatermark);
      this.open(this.currentWatermark);
    });
  }

  /** Process one delivered batch. Ignored while stopped. */
  onBatch(entries: readonly RelayEntry[]): Promise<void> {
    return this.serialize(() => this.applyBatch(entries));
  }

  /**
   * Close the live query and clear the handle. A no-op when already stopped.
   *
   * @param expected - Only stop if this is still the current handle
   */
  stop(expected?: SubscriptionHandle): Promise<void> {
    return this.serialize(async () => {
      if (expected && expected !== this.currentHandle) return;
      await this.close();
    });
  }

  private async applyBatch(entries: readonly RelayEntry[]): Promise<void> {
    const handle = this.currentHandle;
    const watermark = this.currentWatermark;
    if (!handle || watermark === null) return;

    let candidate = watermark;
    for (const entry of entries) {
      if (entry.roomCode !== this.roomCode) continue;
      // Stale: already delivered, or the boundary entry re-sent after a restart.
      if (entry.timestamp <= watermark) continue;

      this.logger.debug(`[WatermarkSubscription] New entry at ${entry.timestamp}: ${entry.payload}`);
      this.emit(entry);
      if (entry.timestamp > candidate) candidate = entry.timestamp;
    }
    if (candidate <= watermark) return;

    if (handle.status === 'faulted') {
      // Leave the faulted handle in place for the fault monitor to report.
      this.currentWatermark = candidate;
      return;
    }

    this.logger.debug(`[WatermarkSubscription] Advancing watermark ${watermark} -> ${candidate}`);
    await this.close();
    this.currentWatermark = candidate;
    try {
      this.open(candidate);
    } catch (err) {
      // Left for the fault monitor, like a query that faults after opening.
      this.logger.debug('[WatermarkSubscription] Failed to reopen live query');
      const query = roomQuery(this.roomCode, candidate);
      this.currentHandle = SubscriptionHandle.failed(query, candidate, err);
    }
  }

  private open(watermark: Instant): void {
    const generation = ++this.generation;
    const query = roomQuery(this.roomCode, watermark);
    const registration = this.collection.listen(query, (snapshot) =>
      this.receive(generation, snapshot),
    );
    this.currentHandle = new SubscriptionHandle(registration, query, watermark);
  }

  private async close(): Promise<void> {
    const handle = this.currentHandle;
    if (!handle) return;
    await handle.close();
    this.currentHandle = null;
  }

  /** Store callback: decode the snapshot and queue it behind pending work. */
  private receive(generation: number, snapshot: QuerySnapshot): void {
    if (generation !== this.generation) return;
    this.logger.debug(
      `[WatermarkSubscription] Received snapshot with ${snapshot.docs.length} document(s)` +
        (snapshot.fromCache ? ' from cache' : ''),
    );

    const entries: RelayEntry[] = [];
    for (const doc of snapshot.docs) {
      try {
        entries.push(this.codec.decode(doc));
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        this.logger.warn(`[WatermarkSubscription] Skipping document: ${err.message}`);
      }
    }

    this.serialize(async () => {
      // A restart or stop may have happened while this batch was queued.
      if (generation !== this.generation || !this.currentHandle) return;
      await this.applyBatch(entries);
    }).catch((err: unknown) => {
      this.logger.error('[WatermarkSubscription] Failed to process batch:', err);
    });
  }

  private emit(entry: RelayEntry): void {
    try {
      this.onEntry(entry);
    } catch (err) {
      this.logger.warn('[WatermarkSubscription] Entry handler failed:', err);
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
