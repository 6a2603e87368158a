import type { ConsolaInstance } from 'consola';
import type { Unsubscribe } from './types.js';

/**
 * Ordered observer registrations for one event.
 *
 * Observers run synchronously in registration order. One that throws is
 * logged and the rest still run. Registering the same function twice
 * yields two independent registrations.
 */
export class ObserverList<Args extends unknown[]> {
  private registrations: Array<{ observer: (...args: Args) => void }> = [];

  constructor(
    /** Log tag of the component that owns the event. */
    private readonly owner: string,
    private readonly event: string,
    private readonly logger: ConsolaInstance,
  ) {}

  get size(): number {
    return this.registrations.length;
  }

  add(observer: (...args: Args) => void): Unsubscribe {
    const registration = { observer };
    this.registrations.push(registration);
    return () => {
      this.registrations = this.registrations.filter((r) => r !== registration);
    };
  }

  notify(...args: Args): void {
    for (const { observer } of [...this.registrations]) {
      try {
        observer(...args);
      } catch (err) {
        this.logger.warn(`[${this.owner}] '${this.event}' observer failed:`, err);
      }
    }
  }
}
