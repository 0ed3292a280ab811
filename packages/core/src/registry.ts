import { AuthorityRegistry } from "./authorities";
import { Authorizer } from "./authorization";
import { createAuditLogger, type AuditLogger, type AuditLoggerConfig } from "./audit";
import { HeightClock, type LedgerClock } from "./clock";
import type { RegistryDefinition } from "./definitions";
import type { CallContext, Identity } from "./identity";
import { RecordLedger } from "./ledger";
import { MemoryLedgerStore } from "./store/memory";
import type { LedgerStore, LedgerTransaction } from "./store/types";
import type {
  AuditEntry,
  AuditOperation,
  Authority,
  AuthorityRegistration,
  LedgerRecord,
  OperationResult,
  RecordInput,
  RegistryKind,
  ValidityReport,
} from "./types";
import { RegistryError } from "./types";
import { evaluateValidity, isRecordValid } from "./validity";
import { randomUUID } from "crypto";

/**
 * Registry configuration.
 */
export interface CredentialRegistryConfig<P, S extends string> {
  // Deployer identity: manages admins, cannot be removed
  owner: Identity;

  // Defaults to a fresh MemoryLedgerStore
  store?: LedgerStore<LedgerRecord<P, S>>;

  // Defaults to a HeightClock at height 0
  clock?: LedgerClock;

  // Defaults to "none"
  auditLogger?: AuditLoggerConfig;
}

type AuditCorrelation = Pick<AuditEntry, "authorityId" | "recordId" | "subjectId">;

/**
 * One credential registry: admins, authorities, records and validity.
 *
 * Every mutating operation:
 * 1. runs as one serialized store transaction
 * 2. reads the clock once
 * 3. either commits every write or none
 * 4. returns an OperationResult instead of throwing for domain failures
 * 5. emits one audit entry
 *
 * Store failures (connection loss, etc.) are not domain failures and
 * propagate as thrown errors.
 *
 * @example
 * ```typescript
 * const privileges = createPrivilegeRegistry({ owner: "owner-1", clock });
 *
 * await privileges.addAdmin({ caller: "owner-1" }, "admin-1");
 * await privileges.registerAuthority({ caller: "hospital-1" }, { name: "General Hospital" });
 * await privileges.setAuthorityVerified({ caller: "admin-1" }, "hospital-1", true);
 *
 * const issued = await privileges.issue({ caller: "hospital-1" }, "provider-1", {
 *   payload: { procedureCode: "CPT-33533", procedureName: "Coronary bypass" },
 *   expiresAt: 1000,
 * });
 *
 * if (issued.ok) {
 *   await privileges.isValid(issued.value); // true until height 1000
 * }
 * ```
 */
export class CredentialRegistry<P, S extends string> {
  protected readonly authorizer: Authorizer;
  protected readonly authorities: AuthorityRegistry;
  protected readonly ledger: RecordLedger<P, S>;
  protected readonly store: LedgerStore<LedgerRecord<P, S>>;
  protected readonly clock: LedgerClock;
  protected readonly auditLogger: AuditLogger;

  constructor(
    protected readonly definition: RegistryDefinition<P, S>,
    config: CredentialRegistryConfig<P, S>
  ) {
    this.authorizer = new Authorizer(config.owner);
    this.authorities = new AuthorityRegistry(this.authorizer);
    this.ledger = new RecordLedger(definition, this.authorizer, this.authorities);
    this.store = config.store ?? new MemoryLedgerStore<LedgerRecord<P, S>>();
    this.clock = config.clock ?? new HeightClock();
    this.auditLogger = createAuditLogger(config.auditLogger);
  }

  get kind(): RegistryKind {
    return this.definition.kind;
  }

  get owner(): Identity {
    return this.authorizer.ownerId;
  }

  // ==========================================================================
  // ADMINS
  // ==========================================================================

  async addAdmin(ctx: CallContext, id: Identity): Promise<OperationResult<true>> {
    return this.run(ctx, "addAdmin", {}, async (tx) => {
      await this.authorizer.addAdmin(tx, ctx, id);
      return true as const;
    });
  }

  async removeAdmin(
    ctx: CallContext,
    id: Identity
  ): Promise<OperationResult<true>> {
    return this.run(ctx, "removeAdmin", {}, async (tx) => {
      await this.authorizer.removeAdmin(tx, ctx, id);
      return true as const;
    });
  }

  async isAdmin(id: Identity): Promise<boolean> {
    return this.store.read((view) => this.authorizer.isAdmin(view, id));
  }

  // ==========================================================================
  // AUTHORITIES
  // ==========================================================================

  async registerAuthority(
    ctx: CallContext,
    input: AuthorityRegistration
  ): Promise<OperationResult<Authority>> {
    return this.run(ctx, "register", { authorityId: ctx.caller }, (tx, now) =>
      this.authorities.register(tx, ctx, input, now)
    );
  }

  async setAuthorityVerified(
    ctx: CallContext,
    authorityId: Identity,
    verified: boolean
  ): Promise<OperationResult<Authority>> {
    return this.run(ctx, "setVerified", { authorityId }, (tx) =>
      this.authorities.setVerified(tx, ctx, authorityId, verified)
    );
  }

  async getAuthority(authorityId: Identity): Promise<Authority | null> {
    return this.store.read((view) => this.authorities.get(view, authorityId));
  }

  async listAuthorities(): Promise<Authority[]> {
    return this.store.read((view) => this.authorities.list(view));
  }

  // ==========================================================================
  // RECORDS
  // ==========================================================================

  /**
   * Issue a record as the calling (verified) authority. Returns the new id.
   */
  async issue(
    ctx: CallContext,
    subjectId: Identity,
    input: RecordInput<P>
  ): Promise<OperationResult<number>> {
    return this.run(
      ctx,
      "issue",
      { authorityId: ctx.caller, subjectId },
      async (tx, now) => {
        const record = await this.ledger.issue(tx, ctx, subjectId, input, now);
        return record.id;
      },
      (id) => ({ recordId: id })
    );
  }

  async getRecord(recordId: number): Promise<LedgerRecord<P, S> | null> {
    return this.store.read((view) => this.ledger.get(view, recordId));
  }

  async listBySubject(subjectId: Identity): Promise<LedgerRecord<P, S>[]> {
    return this.store.read((view) => this.ledger.listBySubject(view, subjectId));
  }

  async listByAuthority(authorityId: Identity): Promise<LedgerRecord<P, S>[]> {
    return this.store.read((view) =>
      this.ledger.listByAuthority(view, authorityId)
    );
  }

  /**
   * Number of records ever created in this registry.
   */
  async recordCount(): Promise<number> {
    return this.store.read((view) => view.lastRecordId());
  }

  // ==========================================================================
  // VALIDITY
  // ==========================================================================

  /**
   * Active status AND not expired. Missing records are not valid.
   */
  async isValid(recordId: number): Promise<boolean> {
    const now = this.clock.now();
    const record = await this.getRecord(recordId);
    return isRecordValid(record, now, this.definition.activeStatus);
  }

  async checkValidity(recordId: number): Promise<ValidityReport> {
    const now = this.clock.now();
    const record = await this.getRecord(recordId);
    return evaluateValidity(recordId, record, now, this.definition.activeStatus);
  }

  // ==========================================================================
  // OPERATION RUNNER
  // ==========================================================================

  protected async run<T>(
    ctx: CallContext,
    operation: AuditOperation,
    correlation: AuditCorrelation,
    work: (tx: LedgerTransaction<LedgerRecord<P, S>>, now: number) => Promise<T>,
    describe?: (value: T) => AuditCorrelation
  ): Promise<OperationResult<T>> {
    let now: number | undefined;

    try {
      const value = await this.store.transaction((tx) => {
        now = this.clock.now();
        return work(tx, now);
      });

      await this.audit({
        timestamp: now ?? this.clock.now(),
        operation,
        actor: ctx.caller,
        requestId: ctx.requestId,
        outcome: "success",
        ...correlation,
        ...describe?.(value),
      });

      return { ok: true, value };
    } catch (error) {
      if (!(error instanceof RegistryError)) {
        throw error;
      }

      await this.audit({
        timestamp: now ?? this.clock.now(),
        operation,
        actor: ctx.caller,
        requestId: ctx.requestId,
        outcome: "failure",
        code: error.code,
        reason: error.reason,
        ...correlation,
      });

      return { ok: false, code: error.code, reason: error.reason };
    }
  }

  private async audit(
    entry: Omit<AuditEntry, "id" | "registry">
  ): Promise<void> {
    try {
      await this.auditLogger.log({
        id: `audit-${randomUUID()}`,
        registry: this.definition.kind,
        ...entry,
      });
    } catch (err) {
      console.error("[AUDIT ERROR]", err);
    }
  }
}
