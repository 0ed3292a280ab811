import { createAuditLogger, type AuditLoggerConfig } from "./audit";
import { HeightClock, type LedgerClock } from "./clock";
import {
  panelRegistry,
  privilegeRegistry,
  qualificationRegistry,
} from "./definitions";
import type { CallContext, Identity } from "./identity";
import { CredentialRegistry, type CredentialRegistryConfig } from "./registry";
import type { LedgerStore } from "./store/types";
import type {
  LedgerRecord,
  OperationResult,
  PanelMembershipRecord,
  PrivilegeRecord,
  QualificationRecord,
  QualificationStatus,
  RecordInput,
} from "./types";
import type {
  PanelPayload,
  PrivilegePayload,
  QualificationPayload,
} from "./validation";

/**
 * Qualification registry.
 *
 * Besides authority issuance, providers may self-report a qualification
 * against a named authority, which that authority later verifies.
 */
export class QualificationRegistry extends CredentialRegistry<
  QualificationPayload,
  QualificationStatus
> {
  constructor(
    config: CredentialRegistryConfig<QualificationPayload, QualificationStatus>
  ) {
    super(qualificationRegistry, config);
  }

  /**
   * Record an unverified qualification held by the caller. Returns the new id.
   */
  async selfReport(
    ctx: CallContext,
    authorityId: Identity,
    input: RecordInput<QualificationPayload>
  ): Promise<OperationResult<number>> {
    return this.run(
      ctx,
      "selfReport",
      { authorityId, subjectId: ctx.caller },
      async (tx, now) => {
        const record = await this.ledger.selfReport(
          tx,
          ctx,
          authorityId,
          input,
          now
        );
        return record.id;
      },
      (id) => ({ recordId: id })
    );
  }

  async verify(
    ctx: CallContext,
    recordId: number
  ): Promise<OperationResult<QualificationRecord>> {
    return this.run(ctx, "verify", { recordId }, (tx, now) =>
      this.ledger.verify(tx, ctx, recordId, now)
    );
  }
}

/**
 * Registry whose records carry a free-text status tag and a renewable
 * expiration (privileges, panel memberships).
 */
export class StatusTrackedRegistry<P> extends CredentialRegistry<P, string> {
  /**
   * Replace the status tag, and the restrictions when given.
   */
  async updateStatus(
    ctx: CallContext,
    recordId: number,
    status: string,
    restrictions?: string
  ): Promise<OperationResult<LedgerRecord<P, string>>> {
    return this.run(ctx, "updateStatus", { recordId }, (tx, now) =>
      this.ledger.updateStatus(tx, ctx, recordId, status, restrictions, now)
    );
  }

  async renew(
    ctx: CallContext,
    recordId: number,
    expiresAt: number
  ): Promise<OperationResult<LedgerRecord<P, string>>> {
    return this.run(ctx, "renew", { recordId }, (tx, now) =>
      this.ledger.renew(tx, ctx, recordId, expiresAt, now)
    );
  }
}

export type PrivilegeRegistry = StatusTrackedRegistry<PrivilegePayload>;
export type PanelRegistry = StatusTrackedRegistry<PanelPayload>;

export function createQualificationRegistry(
  config: CredentialRegistryConfig<QualificationPayload, QualificationStatus>
): QualificationRegistry {
  return new QualificationRegistry(config);
}

export function createPrivilegeRegistry(
  config: CredentialRegistryConfig<PrivilegePayload, string>
): PrivilegeRegistry {
  return new StatusTrackedRegistry(privilegeRegistry, config);
}

export function createPanelRegistry(
  config: CredentialRegistryConfig<PanelPayload, string>
): PanelRegistry {
  return new StatusTrackedRegistry(panelRegistry, config);
}

// ============================================================================
// SUITE - All three registries behind one owner and clock
// ============================================================================

export interface RegistrySuiteConfig {
  owner: Identity;
  clock?: LedgerClock;
  auditLogger?: AuditLoggerConfig;
  stores?: {
    qualifications?: LedgerStore<QualificationRecord>;
    privileges?: LedgerStore<PrivilegeRecord>;
    panels?: LedgerStore<PanelMembershipRecord>;
  };
}

export interface RegistrySuite {
  qualifications: QualificationRegistry;
  privileges: PrivilegeRegistry;
  panels: PanelRegistry;
}

/**
 * Build the three registries. Each keeps its own store (admins, authorities,
 * records and id counter are per registry); owner, clock and audit logger are
 * shared.
 */
export function createRegistrySuite(config: RegistrySuiteConfig): RegistrySuite {
  const shared = {
    owner: config.owner,
    clock: config.clock ?? new HeightClock(),
    auditLogger: createAuditLogger(config.auditLogger),
  };

  return {
    qualifications: createQualificationRegistry({
      ...shared,
      store: config.stores?.qualifications,
    }),
    privileges: createPrivilegeRegistry({
      ...shared,
      store: config.stores?.privileges,
    }),
    panels: createPanelRegistry({ ...shared, store: config.stores?.panels }),
  };
}
