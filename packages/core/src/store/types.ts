import type { Identity } from "../identity";
import type { AnyLedgerRecord, Authority } from "../types";

/**
 * Read access to one registry's state.
 */
export interface LedgerView<R extends AnyLedgerRecord> {
  getAuthority(id: Identity): Promise<Authority | null>;

  /**
   * All authorities, in registration order.
   */
  listAuthorities(): Promise<Authority[]>;

  getRecord(id: number): Promise<R | null>;

  /**
   * Records matching every given filter field, ordered by id.
   */
  listRecords(filter: RecordFilter): Promise<R[]>;

  /**
   * Admin lookup. Unknown identities are not admins.
   */
  isAdmin(id: Identity): Promise<boolean>;

  /**
   * Last allocated record id (0 if none).
   */
  lastRecordId(): Promise<number>;
}

export interface RecordFilter {
  subjectId?: Identity;
  authorityId?: Identity;
}

/**
 * Write access inside one serialized transaction.
 *
 * Writes are only visible to other callers once the transaction commits. If
 * the transaction's work throws, every write is discarded.
 */
export interface LedgerTransaction<R extends AnyLedgerRecord>
  extends LedgerView<R> {
  /**
   * Store the full authority, replacing any previous value.
   */
  putAuthority(authority: Authority): Promise<void>;

  /**
   * Allocate the next sequential record id.
   *
   * Consumed only if the transaction commits.
   */
  allocateRecordId(): Promise<number>;

  /**
   * Store the full record, replacing any previous value.
   */
  putRecord(record: R): Promise<void>;

  setAdmin(id: Identity, authorized: boolean): Promise<void>;
}

/**
 * LedgerStore Interface
 *
 * Owns one registry's Authority map, Record map, Admin map and id counter.
 *
 * Implementations:
 * - MemoryLedgerStore: in-process, single server
 * - PostgresLedgerStore (backend): shared, row-locked per registry
 *
 * Transactions are fully serialized per store: at most one runs at a time.
 */
export interface LedgerStore<R extends AnyLedgerRecord> {
  /**
   * Run read-only work against committed state.
   */
  read<T>(work: (view: LedgerView<R>) => Promise<T>): Promise<T>;

  /**
   * Run `work` as one all-or-nothing transaction.
   *
   * Resolves with the work's result after commit. Rejects with the work's
   * error after rollback.
   */
  transaction<T>(work: (tx: LedgerTransaction<R>) => Promise<T>): Promise<T>;
}
