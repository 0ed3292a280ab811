import type { Identity } from "../identity";
import type { AnyLedgerRecord, Authority } from "../types";
import type {
  LedgerStore,
  LedgerTransaction,
  LedgerView,
  RecordFilter,
} from "./types";

function matches(record: AnyLedgerRecord, filter: RecordFilter): boolean {
  if (filter.subjectId !== undefined && record.subjectId !== filter.subjectId) {
    return false;
  }
  if (
    filter.authorityId !== undefined &&
    record.authorityId !== filter.authorityId
  ) {
    return false;
  }
  return true;
}

/**
 * Committed state of a MemoryLedgerStore.
 */
interface MemoryState<R extends AnyLedgerRecord> {
  authorities: Map<Identity, Authority>;
  records: Map<number, R>;
  admins: Map<Identity, boolean>;
  lastRecordId: number;
}

/**
 * View over committed state. Returns copies so callers cannot mutate the
 * store from outside a transaction.
 */
class CommittedView<R extends AnyLedgerRecord> implements LedgerView<R> {
  constructor(protected readonly state: MemoryState<R>) {}

  async getAuthority(id: Identity): Promise<Authority | null> {
    const authority = this.state.authorities.get(id);
    return authority ? structuredClone(authority) : null;
  }

  async listAuthorities(): Promise<Authority[]> {
    return Array.from(this.state.authorities.values(), (a) =>
      structuredClone(a)
    );
  }

  async getRecord(id: number): Promise<R | null> {
    const record = this.state.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async listRecords(filter: RecordFilter): Promise<R[]> {
    return Array.from(this.state.records.values())
      .filter((record) => matches(record, filter))
      .sort((a, b) => a.id - b.id)
      .map((record) => structuredClone(record));
  }

  async isAdmin(id: Identity): Promise<boolean> {
    return this.state.admins.get(id) === true;
  }

  async lastRecordId(): Promise<number> {
    return this.state.lastRecordId;
  }
}

/**
 * Transaction that stages every write and only touches committed state in
 * `commit()`.
 */
class StagedTransaction<R extends AnyLedgerRecord>
  extends CommittedView<R>
  implements LedgerTransaction<R>
{
  private authorities = new Map<Identity, Authority>();
  private records = new Map<number, R>();
  private admins = new Map<Identity, boolean>();
  private allocatedUpTo: number | null = null;

  async getAuthority(id: Identity): Promise<Authority | null> {
    const staged = this.authorities.get(id);
    return staged ? structuredClone(staged) : super.getAuthority(id);
  }

  async listAuthorities(): Promise<Authority[]> {
    const merged = new Map(this.state.authorities);
    for (const [id, authority] of this.authorities) {
      merged.set(id, authority);
    }
    return Array.from(merged.values(), (a) => structuredClone(a));
  }

  async getRecord(id: number): Promise<R | null> {
    const staged = this.records.get(id);
    return staged ? structuredClone(staged) : super.getRecord(id);
  }

  async listRecords(filter: RecordFilter): Promise<R[]> {
    const merged = new Map(this.state.records);
    for (const [id, record] of this.records) {
      merged.set(id, record);
    }
    return Array.from(merged.values())
      .filter((record) => matches(record, filter))
      .sort((a, b) => a.id - b.id)
      .map((record) => structuredClone(record));
  }

  async isAdmin(id: Identity): Promise<boolean> {
    const staged = this.admins.get(id);
    return staged !== undefined ? staged : super.isAdmin(id);
  }

  async lastRecordId(): Promise<number> {
    return this.allocatedUpTo ?? this.state.lastRecordId;
  }

  async putAuthority(authority: Authority): Promise<void> {
    this.authorities.set(authority.id, structuredClone(authority));
  }

  async allocateRecordId(): Promise<number> {
    const next = (this.allocatedUpTo ?? this.state.lastRecordId) + 1;
    this.allocatedUpTo = next;
    return next;
  }

  async putRecord(record: R): Promise<void> {
    this.records.set(record.id, structuredClone(record));
  }

  async setAdmin(id: Identity, authorized: boolean): Promise<void> {
    this.admins.set(id, authorized);
  }

  commit(): void {
    for (const [id, authority] of this.authorities) {
      this.state.authorities.set(id, authority);
    }
    for (const [id, record] of this.records) {
      this.state.records.set(id, record);
    }
    for (const [id, authorized] of this.admins) {
      this.state.admins.set(id, authorized);
    }
    if (this.allocatedUpTo !== null) {
      this.state.lastRecordId = this.allocatedUpTo;
    }
  }
}

/**
 * In-memory LedgerStore.
 *
 * Limitations:
 * - Not shared across processes
 * - Lost on restart
 *
 * Use for:
 * - Single-process deployment
 * - Development/testing
 *
 * Transactions queue behind each other, so at most one runs at a time. Reads
 * see committed state only.
 */
export class MemoryLedgerStore<R extends AnyLedgerRecord>
  implements LedgerStore<R>
{
  private state: MemoryState<R> = MemoryLedgerStore.emptyState();
  private tail: Promise<void> = Promise.resolve();

  async read<T>(work: (view: LedgerView<R>) => Promise<T>): Promise<T> {
    return work(new CommittedView(this.state));
  }

  transaction<T>(work: (tx: LedgerTransaction<R>) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const tx = new StagedTransaction(this.state);
      const result = await work(tx);
      tx.commit();
      return result;
    });

    // Keep the queue alive whatever this transaction's outcome
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  /**
   * Clear all state (for testing).
   */
  clear(): void {
    this.state = MemoryLedgerStore.emptyState();
  }

  private static emptyState<R extends AnyLedgerRecord>(): MemoryState<R> {
    return {
      authorities: new Map(),
      records: new Map(),
      admins: new Map(),
      lastRecordId: 0,
    };
  }
}
