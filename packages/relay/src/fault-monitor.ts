/**
 * Per-tick inspection of the live query for termination.
 *
 * The monitor never reopens a query: once the listening task has ended, the
 * subscription is torn down and stays down until the relay is started again.
 *
 * @module relay/fault-monitor
 */
import type { ConsolaInstance } from 'consola';
import { INDEX_REQUIRED_MESSAGE } from '@roomrelay/db';
import { IndexRequiredFault, QueryFault, errorMessage } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { RelayFault } from './types.js';
import type { WatermarkSubscription } from './watermark-subscription.js';

/** Wrap the error a live query failed with in the matching fault class. */
export function classifyQueryError(err: unknown): QueryFault {
  const message = errorMessage(err);
  if (message.startsWith(INDEX_REQUIRED_MESSAGE)) {
    return new IndexRequiredFault(message, { cause: err });
  }
  return new QueryFault(message, { cause: err });
}

export class FaultMonitor {
  constructor(private readonly logger: ConsolaInstance = defaultLogger) {}

  /**
   * Inspect the subscription's current handle without blocking.
   *
   * Only awaits (the teardown) once termination is already known.
   *
   * @returns The fault that ended the query, or `null` while it is still
   *   running, already torn down, or being stopped by its owner
   */
  async check(subscription: WatermarkSubscription): Promise<RelayFault | null> {
    const handle = subscription.handle;
    if (!handle || !handle.isTerminated || handle.stopRequested) return null;

    let fault: RelayFault;
    if (handle.status === 'completed') {
      this.logger.debug('[FaultMonitor] Live query completed without error');
      fault = { kind: 'completed' };
    } else {
      const error = classifyQueryError(handle.error);
      if (error instanceof IndexRequiredFault) {
        const fields = handle.query.where.map((f) => f.field).join(', ');
        this.logger.error(
          `[FaultMonitor] The store requires an index on (${fields}) in '${subscription.collectionName}'. ` +
            'Create it out of band using the details in the following error, then restart the relay.',
        );
        fault = { kind: 'index-required', error };
      } else {
        fault = { kind: 'query-fault', error };
      }
      this.logger.error('[FaultMonitor] Live query faulted:', handle.error);
    }

    this.logger.debug('[FaultMonitor] Stopping live query');
    await subscription.stop(handle);
    return fault;
  }
}
