import { AsyncLocalStorage } from "node:async_hooks";
import type { Logger } from "../logging/logger.js";
import { Mutex } from "./mutex.js";

type Undo = () => void;

interface Journal {
  id: number;
  undo: Undo[];
}

/**
 * A keyed table whose writes are journaled by the owning ledger.
 *
 * Rows are replaced, never mutated in place: `get` hands out the stored
 * object as `Readonly`, and every change goes through `set`/`delete` so the
 * previous row can be restored on rollback.
 */
export class Table<V> {
  private rows = new Map<string, V>();

  constructor(
    readonly name: string,
    private readonly ledger: Ledger,
  ) {}

  get size(): number {
    return this.rows.size;
  }

  get(key: string): Readonly<V> | undefined {
    return this.rows.get(key);
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  set(key: string, value: V): void {
    this.remember(key);
    this.rows.set(key, value);
  }

  delete(key: string): boolean {
    if (!this.rows.has(key)) return false;
    this.remember(key);
    this.rows.delete(key);
    return true;
  }

  values(): Readonly<V>[] {
    return [...this.rows.values()];
  }

  entries(): [string, Readonly<V>][] {
    return [...this.rows.entries()];
  }

  /** Rows whose key starts with `prefix`, in insertion order. */
  scan(prefix: string): [string, Readonly<V>][] {
    return this.entries().filter(([key]) => key.startsWith(prefix));
  }

  private remember(key: string): void {
    const had = this.rows.has(key);
    const previous = this.rows.get(key);
    this.ledger.record(() => {
      if (had && previous !== undefined) {
        this.rows.set(key, previous);
      } else {
        this.rows.delete(key);
      }
    });
  }
}

/**
 * In-memory store of keyed tables with one serialized transaction
 * boundary.
 *
 * `transaction()` takes the ledger mutex, so operations run one at a time.
 * A transaction started while another is active in the same async context
 * joins it as a savepoint: on failure only its own writes are undone and
 * the error propagates to the enclosing operation.
 */
export class Ledger {
  private readonly names = new Set<string>();
  private readonly scope = new AsyncLocalStorage<Journal>();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private nextJournalId = 1;

  constructor(logger: Logger) {
    this.logger = logger.child({ module: "ledger" });
  }

  table<V>(name: string): Table<V> {
    if (this.names.has(name)) {
      throw new Error(`Ledger table "${name}" is already registered`);
    }
    this.names.add(name);
    return new Table<V>(name, this);
  }

  get inTransaction(): boolean {
    return this.scope.getStore() !== undefined;
  }

  async transaction<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const active = this.scope.getStore();
    if (active) {
      return this.runWithin(active, label, fn, true);
    }
    return this.mutex.runExclusive(() =>
      this.runWithin({ id: this.nextJournalId++, undo: [] }, label, fn, false),
    );
  }

  /** Serialized read. Joins the active transaction when there is one. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.scope.getStore()) return fn();
    return this.mutex.runExclusive(fn);
  }

  /** @internal Called by tables before each write. */
  record(undo: Undo): void {
    this.scope.getStore()?.undo.push(undo);
  }

  private async runWithin<T>(
    journal: Journal,
    label: string,
    fn: () => Promise<T>,
    nested: boolean,
  ): Promise<T> {
    const savepoint = journal.undo.length;
    try {
      return await this.scope.run(journal, fn);
    } catch (error) {
      const undone = journal.undo.length - savepoint;
      for (let i = journal.undo.length - 1; i >= savepoint; i--) {
        journal.undo[i]();
      }
      journal.undo.length = savepoint;
      this.logger.debug(
        { journal: journal.id, operation: label, undone, nested },
        "Rolled back",
      );
      throw error;
    }
  }
}
