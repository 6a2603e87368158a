/**
 * Polling live query used by {@link SqliteDocumentStore}.
 *
 * Each query remembers the highest row sequence it has delivered and reads
 * only newer rows on every poll. Polls run on an interval (to see writers in
 * other processes sharing the database file) and right after an append made
 * through the same store.
 *
 * @module db/live-query
 */
import type { ListenerRegistration, QuerySnapshot, SnapshotListener, StoredDocument } from './types.js';

/** A stored document together with its insertion sequence. */
export interface SequencedDocument extends StoredDocument {
  seq: number;
}

export interface LiveQueryOptions {
  /** Read matching documents with a sequence greater than `afterSeq`. */
  read: (afterSeq: number) => SequencedDocument[];
  listener: SnapshotListener;
  /** `0` disables interval polling. */
  pollIntervalMs: number;
  /** Documents replayed with `fromCache: true` before the first read. */
  cached?: StoredDocument[];
  /** Called with every fresh (non-cached) delivery. */
  onDelivered?: (docs: StoredDocument[], initial: boolean) => void;
  /** Called exactly once when the query stops or faults. */
  onSettled?: () => void;
}

export class LiveQuery implements ListenerRegistration {
  readonly done: Promise<void>;
  private readonly resolveDone: () => void;
  private readonly rejectDone: (err: unknown) => void;
  private lastSeq = 0;
  private initial = true;
  private settled = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending: ReturnType<typeof setImmediate> | null = null;

  constructor(private readonly options: LiveQueryOptions) {
    let resolve: () => void = () => undefined;
    let reject: (err: unknown) => void = () => undefined;
    this.done = new Promise<void>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.resolveDone = resolve;
    this.rejectDone = reject;
  }

  /** Schedule the first read and start interval polling. */
  start(): void {
    this.schedule();
    if (this.options.pollIntervalMs > 0) {
      this.timer = setInterval(() => this.poll(), this.options.pollIntervalMs);
    }
  }

  /** Schedule a read on the next turn of the event loop. Coalesces repeated calls. */
  schedule(): void {
    if (this.settled || this.pending) return;
    this.pending = setImmediate(() => {
      this.pending = null;
      this.poll();
    });
  }

  stop(): void {
    if (this.settle()) this.resolveDone();
  }

  /** Terminate the query with an error. */
  fail(err: unknown): void {
    if (this.settle()) this.rejectDone(err);
  }

  get isSettled(): boolean {
    return this.settled;
  }

  private poll(): void {
    if (this.settled) return;

    const initial = this.initial;
    if (initial && this.options.cached && this.options.cached.length > 0) {
      if (!this.emit({ docs: this.options.cached, fromCache: true })) return;
      if (this.settled) return;
    }

    let rows: SequencedDocument[];
    try {
      rows = this.options.read(this.lastSeq);
    } catch (err) {
      this.fail(err);
      return;
    }

    // The first snapshot is always delivered, even when empty.
    if (rows.length === 0 && !initial) return;
    this.initial = false;

    for (const row of rows) {
      if (row.seq > this.lastSeq) this.lastSeq = row.seq;
    }
    const docs = rows.map(({ id, data }) => ({ id, data }));
    this.options.onDelivered?.(docs, initial);
    this.emit({ docs, fromCache: false });
  }

  /** Invoke the listener; a throwing listener faults the query. */
  private emit(snapshot: QuerySnapshot): boolean {
    try {
      this.options.listener(snapshot);
      return true;
    } catch (err) {
      this.fail(err);
      return false;
    }
  }

  private settle(): boolean {
    if (this.settled) return false;
    this.settled = true;
    if (this.timer) clearInterval(this.timer);
    if (this.pending) clearImmediate(this.pending);
    this.timer = null;
    this.pending = null;
    this.options.onSettled?.();
    return true;
  }
}
