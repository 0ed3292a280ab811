import { and, asc, eq, sql, SQL } from 'drizzle-orm';
import type {
  Authority,
  Identity,
  LedgerRecord,
  LedgerStore,
  LedgerTransaction,
  LedgerView,
  RecordFilter,
  RegistryDefinition,
} from '@credentia/core';
import type { Executor } from '../database/database.module';
import type { DatabaseService } from '../database/database.service';
import * as schema from '../database/schema';

/**
 * One registry's view of the shared tables. Every query is scoped to
 * `definition.kind`.
 */
class PostgresLedgerView<P, S extends string>
  implements LedgerView<LedgerRecord<P, S>>
{
  constructor(
    protected readonly db: Executor,
    protected readonly definition: RegistryDefinition<P, S>,
  ) {}

  protected get registry(): string {
    return this.definition.kind;
  }

  async getAuthority(id: Identity): Promise<Authority | null> {
    const [row] = await this.db
      .select()
      .from(schema.authorities)
      .where(
        and(
          eq(schema.authorities.registry, this.registry),
          eq(schema.authorities.identity, id),
        ),
      )
      .limit(1);

    return row ? toAuthority(row) : null;
  }

  async listAuthorities(): Promise<Authority[]> {
    const rows = await this.db
      .select()
      .from(schema.authorities)
      .where(eq(schema.authorities.registry, this.registry))
      .orderBy(asc(schema.authorities.seq));

    return rows.map(toAuthority);
  }

  async getRecord(id: number): Promise<LedgerRecord<P, S> | null> {
    // Ids are allocated from 1 and stay within the safe integer range
    if (!Number.isSafeInteger(id) || id < 1) {
      return null;
    }

    const [row] = await this.db
      .select()
      .from(schema.records)
      .where(
        and(
          eq(schema.records.registry, this.registry),
          eq(schema.records.recordId, id),
        ),
      )
      .limit(1);

    return row ? this.toRecord(row) : null;
  }

  async listRecords(filter: RecordFilter): Promise<LedgerRecord<P, S>[]> {
    const conditions: SQL[] = [eq(schema.records.registry, this.registry)];

    if (filter.subjectId !== undefined) {
      conditions.push(eq(schema.records.subjectId, filter.subjectId));
    }
    if (filter.authorityId !== undefined) {
      conditions.push(eq(schema.records.authorityId, filter.authorityId));
    }

    const rows = await this.db
      .select()
      .from(schema.records)
      .where(and(...conditions))
      .orderBy(asc(schema.records.recordId));

    return rows.map((row) => this.toRecord(row));
  }

  async isAdmin(id: Identity): Promise<boolean> {
    const [row] = await this.db
      .select()
      .from(schema.registryAdmins)
      .where(
        and(
          eq(schema.registryAdmins.registry, this.registry),
          eq(schema.registryAdmins.identity, id),
        ),
      )
      .limit(1);

    return row !== undefined;
  }

  async lastRecordId(): Promise<number> {
    const [row] = await this.db
      .select()
      .from(schema.registryCounters)
      .where(eq(schema.registryCounters.registry, this.registry))
      .limit(1);

    return row?.lastRecordId ?? 0;
  }

  // Payload and status are re-validated on the way out of jsonb / varchar
  private toRecord(row: schema.RecordRow): LedgerRecord<P, S> {
    return {
      id: row.recordId,
      registry: this.definition.kind,
      subjectId: row.subjectId,
      authorityId: row.authorityId,
      payload: this.definition.payloadSchema.parse(row.payload),
      createdAt: row.createdAt,
      expiresAt: row.expiresAt,
      verifiedAt: row.verifiedAt,
      lastUpdatedAt: row.lastUpdatedAt,
      status: this.definition.statusSchema.parse(row.status),
      metadata: row.metadata,
    };
  }
}

class PostgresLedgerTransaction<P, S extends string>
  extends PostgresLedgerView<P, S>
  implements LedgerTransaction<LedgerRecord<P, S>>
{
  async putAuthority(authority: Authority): Promise<void> {
    const fields = {
      name: authority.name,
      category: authority.category,
      website: authority.website,
      location: authority.location,
      verified: authority.verified,
      active: authority.active,
      registeredAt: authority.registeredAt,
    };

    await this.db
      .insert(schema.authorities)
      .values({ registry: this.registry, identity: authority.id, ...fields })
      .onConflictDoUpdate({
        target: [schema.authorities.registry, schema.authorities.identity],
        set: fields,
      });
  }

  async allocateRecordId(): Promise<number> {
    const [counter] = await this.db
      .update(schema.registryCounters)
      .set({ lastRecordId: sql`${schema.registryCounters.lastRecordId} + 1` })
      .where(eq(schema.registryCounters.registry, this.registry))
      .returning({ lastRecordId: schema.registryCounters.lastRecordId });

    if (!counter) {
      throw new Error(`No record counter for registry ${this.registry}`);
    }

    return counter.lastRecordId;
  }

  async putRecord(record: LedgerRecord<P, S>): Promise<void> {
    const fields = {
      subjectId: record.subjectId,
      authorityId: record.authorityId,
      payload: record.payload,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
      verifiedAt: record.verifiedAt,
      lastUpdatedAt: record.lastUpdatedAt,
      status: record.status,
      metadata: record.metadata,
    };

    await this.db
      .insert(schema.records)
      .values({ registry: this.registry, recordId: record.id, ...fields })
      .onConflictDoUpdate({
        target: [schema.records.registry, schema.records.recordId],
        set: fields,
      });
  }

  async setAdmin(id: Identity, authorized: boolean): Promise<void> {
    if (authorized) {
      await this.db
        .insert(schema.registryAdmins)
        .values({ registry: this.registry, identity: id })
        .onConflictDoNothing();
      return;
    }

    await this.db
      .delete(schema.registryAdmins)
      .where(
        and(
          eq(schema.registryAdmins.registry, this.registry),
          eq(schema.registryAdmins.identity, id),
        ),
      );
  }
}

function toAuthority(row: schema.AuthorityRow): Authority {
  return {
    id: row.identity,
    name: row.name,
    category: row.category,
    website: row.website,
    location: row.location,
    verified: row.verified,
    active: row.active,
    registeredAt: row.registeredAt,
  };
}

/**
 * LedgerStore backed by PostgreSQL.
 *
 * Each transaction first locks the registry's counter row, so writers to one
 * registry run one at a time across every server sharing the database.
 * Writes to different registries do not block each other.
 */
export class PostgresLedgerStore<P, S extends string>
  implements LedgerStore<LedgerRecord<P, S>>
{
  constructor(
    private readonly database: DatabaseService,
    private readonly definition: RegistryDefinition<P, S>,
  ) {}

  async read<T>(
    work: (view: LedgerView<LedgerRecord<P, S>>) => Promise<T>,
  ): Promise<T> {
    return work(
      new PostgresLedgerView(this.database.connection, this.definition),
    );
  }

  async transaction<T>(
    work: (tx: LedgerTransaction<LedgerRecord<P, S>>) => Promise<T>,
  ): Promise<T> {
    return this.database.transaction(async (tx) => {
      await tx
        .insert(schema.registryCounters)
        .values({ registry: this.definition.kind })
        .onConflictDoNothing();
      await tx
        .select()
        .from(schema.registryCounters)
        .where(eq(schema.registryCounters.registry, this.definition.kind))
        .for('update');

      return work(new PostgresLedgerTransaction(tx, this.definition));
    });
  }
}
