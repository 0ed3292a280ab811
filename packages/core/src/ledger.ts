import type { AuthorityRegistry } from "./authorities";
import type { Authorizer } from "./authorization";
import type { RegistryDefinition } from "./definitions";
import type { CallContext, Identity } from "./identity";
import type { LedgerTransaction, LedgerView } from "./store/types";
import type { LedgerRecord, RecordInput } from "./types";
import { RegistryError } from "./types";
import {
  identitySchema,
  ledgerTimeSchema,
  metadataSchema,
  parseInput,
} from "./validation";

/**
 * Record Ledger
 *
 * Creates and mutates the records of one registry. Every mutation reads the
 * full previous record and writes a full replacement; fields the operation
 * does not own are carried over untouched.
 */
export class RecordLedger<P, S extends string> {
  constructor(
    private readonly definition: RegistryDefinition<P, S>,
    private readonly authorizer: Authorizer,
    private readonly authorities: AuthorityRegistry
  ) {}

  /**
   * Issue a record as the calling authority.
   *
   * The caller must be a registered, verified authority. The id is only
   * consumed if the whole transaction commits.
   */
  async issue(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    subjectId: Identity,
    input: RecordInput<P>,
    now: number
  ): Promise<LedgerRecord<P, S>> {
    const parsed = this.parseRecordInput(subjectId, input);

    await this.authorities.requireVerified(tx, ctx);

    const record: LedgerRecord<P, S> = {
      id: await tx.allocateRecordId(),
      registry: this.definition.kind,
      subjectId,
      authorityId: ctx.caller,
      payload: parsed.payload,
      createdAt: now,
      expiresAt: parsed.expiresAt,
      verifiedAt: now,
      lastUpdatedAt: now,
      status: this.definition.issuedStatus,
      metadata: parsed.metadata,
    };

    await tx.putRecord(record);
    return record;
  }

  /**
   * Record a credential the caller claims to hold, to be verified later by
   * `authorityId`. No precondition on the named authority.
   */
  async selfReport(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    authorityId: Identity,
    input: RecordInput<P>,
    now: number
  ): Promise<LedgerRecord<P, S>> {
    const pending = this.definition.selfReportStatus;
    if (pending === undefined) {
      throw new RegistryError(
        "InvalidInput",
        `The ${this.definition.kind} registry does not accept self-reports`
      );
    }

    const parsed = this.parseRecordInput(authorityId, input);

    const record: LedgerRecord<P, S> = {
      id: await tx.allocateRecordId(),
      registry: this.definition.kind,
      subjectId: ctx.caller,
      authorityId,
      payload: parsed.payload,
      createdAt: now,
      expiresAt: parsed.expiresAt,
      verifiedAt: null,
      lastUpdatedAt: now,
      status: pending,
      metadata: parsed.metadata,
    };

    await tx.putRecord(record);
    return record;
  }

  /**
   * Mark a self-reported record as verified. Record authority only.
   */
  async verify(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    recordId: number,
    now: number
  ): Promise<LedgerRecord<P, S>> {
    const existing = await this.requireOwnRecord(tx, ctx, recordId);

    const updated: LedgerRecord<P, S> = {
      ...existing,
      status: this.definition.activeStatus,
      verifiedAt: now,
      lastUpdatedAt: now,
    };

    await tx.putRecord(updated);
    return updated;
  }

  /**
   * Replace a record's status tag, and its restrictions when given. Record
   * authority only.
   */
  async updateStatus(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    recordId: number,
    status: S,
    restrictions: string | undefined,
    now: number
  ): Promise<LedgerRecord<P, S>> {
    const nextStatus = parseInput(this.definition.statusSchema, status);
    const nextMetadata =
      restrictions === undefined
        ? undefined
        : parseInput(metadataSchema, restrictions);

    const existing = await this.requireOwnRecord(tx, ctx, recordId);

    const updated: LedgerRecord<P, S> = {
      ...existing,
      status: nextStatus,
      metadata: nextMetadata ?? existing.metadata,
      lastUpdatedAt: now,
    };

    await tx.putRecord(updated);
    return updated;
  }

  /**
   * Replace a record's expiration. Record authority only.
   */
  async renew(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    recordId: number,
    expiresAt: number,
    now: number
  ): Promise<LedgerRecord<P, S>> {
    const nextExpiresAt = parseInput(ledgerTimeSchema, expiresAt);

    const existing = await this.requireOwnRecord(tx, ctx, recordId);

    const updated: LedgerRecord<P, S> = {
      ...existing,
      expiresAt: nextExpiresAt,
      lastUpdatedAt: now,
    };

    await tx.putRecord(updated);
    return updated;
  }

  async get(
    view: LedgerView<LedgerRecord<P, S>>,
    recordId: number
  ): Promise<LedgerRecord<P, S> | null> {
    return view.getRecord(recordId);
  }

  async listBySubject(
    view: LedgerView<LedgerRecord<P, S>>,
    subjectId: Identity
  ): Promise<LedgerRecord<P, S>[]> {
    return view.listRecords({ subjectId });
  }

  async listByAuthority(
    view: LedgerView<LedgerRecord<P, S>>,
    authorityId: Identity
  ): Promise<LedgerRecord<P, S>[]> {
    return view.listRecords({ authorityId });
  }

  private async requireOwnRecord(
    tx: LedgerTransaction<LedgerRecord<P, S>>,
    ctx: CallContext,
    recordId: number
  ): Promise<LedgerRecord<P, S>> {
    const existing = await tx.getRecord(recordId);
    if (!existing) {
      throw new RegistryError(
        "NotFound",
        `${this.capitalizedLabel()} ${recordId} not found`
      );
    }

    this.authorizer.requireRecordAuthority(existing, ctx);
    return existing;
  }

  private parseRecordInput(
    counterparty: Identity,
    input: RecordInput<P>
  ): { payload: P; expiresAt: number; metadata: string } {
    parseInput(identitySchema, counterparty);

    return {
      payload: parseInput(this.definition.payloadSchema, input.payload),
      expiresAt: parseInput(ledgerTimeSchema, input.expiresAt),
      metadata: parseInput(metadataSchema, input.metadata ?? ""),
    };
  }

  private capitalizedLabel(): string {
    const label = this.definition.recordLabel;
    return label.charAt(0).toUpperCase() + label.slice(1);
  }
}
