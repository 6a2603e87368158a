import type {
  DocumentCollection,
  DocumentData,
  DocumentStore,
  ListenerRegistration,
  QuerySpec,
  SnapshotListener,
  StoreSettings,
  StoredDocument,
} from '@roomrelay/db';

/** Create a relay entry document with sensible defaults. */
export function createMockEntryDoc(
  overrides: Partial<{ id: string; roomCode: string; timestamp: number; payload: string }> = {},
): StoredDocument {
  const { id = `doc-${overrides.timestamp ?? 0}`, roomCode = 'ABCD', timestamp = 0, payload = 'hello' } =
    overrides;
  return { id, data: { roomCode, timestamp, payload } };
}

/**
 * A live query whose deliveries and termination are driven by the test.
 */
export class ScriptedListener implements ListenerRegistration {
  readonly done: Promise<void>;
  private readonly resolveDone: () => void;
  private readonly rejectDone: (err: unknown) => void;
  private settled = false;
  stopCalls = 0;

  constructor(
    readonly query: QuerySpec,
    private readonly listener: SnapshotListener,
  ) {
    let resolve: () => void = () => undefined;
    let reject: (err: unknown) => void = () => undefined;
    this.done = new Promise<void>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.resolveDone = resolve;
    this.rejectDone = reject;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /** Deliver one snapshot synchronously. Ignored once settled. */
  deliver(docs: StoredDocument[], fromCache = false): void {
    if (this.settled) return;
    this.listener({ docs, fromCache });
  }

  stop(): void {
    this.stopCalls++;
    this.complete();
  }

  /** End the listening task without an error, as if the store stopped it. */
  complete(): void {
    if (this.settled) return;
    this.settled = true;
    this.resolveDone();
  }

  /** End the listening task with an error. */
  fault(err: unknown): void {
    if (this.settled) return;
    this.settled = true;
    this.rejectDone(err);
  }
}

/** Collection that records appends and hands its listeners to the test. */
export class ScriptedCollection implements DocumentCollection {
  readonly listeners: ScriptedListener[] = [];
  readonly added: DocumentData[] = [];
  /** When set, `add` rejects with this error. */
  addError: Error | null = null;

  constructor(readonly name = 'Messages') {}

  async add(data: DocumentData): Promise<string> {
    if (this.addError) throw this.addError;
    this.added.push(data);
    return `doc-${this.added.length}`;
  }

  listen(query: QuerySpec, listener: SnapshotListener): ListenerRegistration {
    const scripted = new ScriptedListener(query, listener);
    this.listeners.push(scripted);
    return scripted;
  }

  /** The most recently opened listener that is still running. */
  get active(): ScriptedListener | undefined {
    return [...this.listeners].reverse().find((l) => !l.isSettled);
  }

  /** Lower timestamp bounds of every query opened so far. */
  get openedFrom(): unknown[] {
    return this.listeners.map((l) => l.query.where.find((f) => f.op === '>=')?.value);
  }
}

/**
 * Store around one {@link ScriptedCollection} that records the lifecycle
 * calls made on it, in order.
 */
export class ScriptedStore implements DocumentStore {
  readonly calls: string[] = [];
  private current: StoreSettings = { persistenceEnabled: true };

  constructor(readonly messages: ScriptedCollection = new ScriptedCollection()) {}

  get settings(): Readonly<StoreSettings> {
    return this.current;
  }

  configure(settings: Partial<StoreSettings>): void {
    this.calls.push(`configure:${JSON.stringify(settings)}`);
    this.current = { ...this.current, ...settings };
  }

  collection(name: string): DocumentCollection {
    this.calls.push(`collection:${name}`);
    return this.messages;
  }

  async terminate(): Promise<void> {
    this.calls.push('terminate');
    for (const listener of this.messages.listeners) listener.complete();
  }

  async clearPersistence(): Promise<void> {
    this.calls.push('clearPersistence');
  }
}
