import type { ListenerRegistration, QuerySpec } from '@roomrelay/db';
import type { Instant } from '@roomrelay/shared/entry-schemas';
import type { HandleStatus } from './types.js';

/**
 * One open live query.
 *
 * Mirrors the settlement of the registration's `done` promise into a status
 * that can be read synchronously, which is what lets the fault monitor poll
 * it once per tick without awaiting anything.
 */
export class SubscriptionHandle {
  private currentStatus: HandleStatus = 'active';
  private failure: unknown = undefined;
  private requested = false;
  private readonly terminated: Promise<void>;

  constructor(
    private readonly registration: ListenerRegistration,
    /** Query this handle was opened with. */
    public readonly query: QuerySpec,
    /** Lower timestamp bound the query was opened from. */
    public readonly watermark: Instant,
  ) {
    this.terminated = registration.done.then(
      () => {
        this.currentStatus = 'completed';
      },
      (err: unknown) => {
        this.currentStatus = 'faulted';
        this.failure = err;
      },
    );
  }

  /**
   * A handle for a query that could not be opened. It reports `faulted`
   * with `err` once promise callbacks have run.
   */
  static failed(query: QuerySpec, watermark: Instant, err: unknown): SubscriptionHandle {
    const registration: ListenerRegistration = {
      done: Promise.reject(err),
      stop: () => undefined,
    };
    return new SubscriptionHandle(registration, query, watermark);
  }

  get status(): HandleStatus {
    return this.currentStatus;
  }

  get isTerminated(): boolean {
    return this.currentStatus !== 'active';
  }

  /** The error the listening task failed with, when `status` is `faulted`. */
  get error(): unknown {
    return this.failure;
  }

  /** Whether the owner asked this handle to stop. */
  get stopRequested(): boolean {
    return this.requested;
  }

  /** Request termination and wait for the listening task to end. Idempotent. */
  async close(): Promise<void> {
    if (this.currentStatus === 'active' && !this.requested) {
      this.requested = true;
      this.registration.stop();
    }
    await this.terminated;
  }
}
