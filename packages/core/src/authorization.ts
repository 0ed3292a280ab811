import type { CallContext, Identity } from "./identity";
import type { LedgerTransaction, LedgerView } from "./store/types";
import type { AnyLedgerRecord } from "./types";
import { RegistryError } from "./types";
import { identitySchema, parseInput } from "./validation";

/**
 * Authorization primitive shared by every registry.
 *
 * Roles:
 * - owner: fixed at construction, manages admins, never stored in the admin map
 * - admin: verifies authorities
 * - record authority: the authority named on a record, the only identity
 *   allowed to mutate it
 *
 * Every check reads the caller from the CallContext.
 */
export class Authorizer {
  constructor(private readonly owner: Identity) {
    parseInput(identitySchema, owner);
  }

  get ownerId(): Identity {
    return this.owner;
  }

  isOwner(id: Identity): boolean {
    return id === this.owner;
  }

  async isAdmin(view: LedgerView<AnyLedgerRecord>, id: Identity): Promise<boolean> {
    return view.isAdmin(id);
  }

  requireOwner(ctx: CallContext): void {
    if (!this.isOwner(ctx.caller)) {
      throw new RegistryError("Unauthorized", "Only the owner can manage admins");
    }
  }

  async requireAdmin(
    view: LedgerView<AnyLedgerRecord>,
    ctx: CallContext
  ): Promise<void> {
    if (!(await view.isAdmin(ctx.caller))) {
      throw new RegistryError("Unauthorized", `${ctx.caller} is not an admin`);
    }
  }

  requireRecordAuthority(record: AnyLedgerRecord, ctx: CallContext): void {
    if (record.authorityId !== ctx.caller) {
      throw new RegistryError(
        "Unauthorized",
        `Only authority ${record.authorityId} can modify record ${record.id}`
      );
    }
  }

  async addAdmin(
    tx: LedgerTransaction<AnyLedgerRecord>,
    ctx: CallContext,
    id: Identity
  ): Promise<void> {
    this.requireOwner(ctx);
    parseInput(identitySchema, id);
    await tx.setAdmin(id, true);
  }

  async removeAdmin(
    tx: LedgerTransaction<AnyLedgerRecord>,
    ctx: CallContext,
    id: Identity
  ): Promise<void> {
    this.requireOwner(ctx);
    parseInput(identitySchema, id);
    await tx.setAdmin(id, false);
  }
}
