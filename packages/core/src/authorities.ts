import type { Authorizer } from "./authorization";
import type { CallContext, Identity } from "./identity";
import type { LedgerTransaction, LedgerView } from "./store/types";
import type { AnyLedgerRecord, Authority, AuthorityRegistration } from "./types";
import { RegistryError } from "./types";
import { authorityRegistrationSchema, parseInput } from "./validation";

/**
 * Authority Registry
 *
 * Self-registration of issuing organizations and admin-controlled
 * verification. Operates on whatever store transaction it is handed.
 */
export class AuthorityRegistry {
  constructor(private readonly authorizer: Authorizer) {}

  /**
   * Register the caller as an authority.
   *
   * New authorities start unverified and active.
   */
  async register(
    tx: LedgerTransaction<AnyLedgerRecord>,
    ctx: CallContext,
    input: AuthorityRegistration,
    now: number
  ): Promise<Authority> {
    const registration = parseInput(authorityRegistrationSchema, input);

    if (await tx.getAuthority(ctx.caller)) {
      throw new RegistryError(
        "AlreadyExists",
        `Authority ${ctx.caller} is already registered`
      );
    }

    const authority: Authority = {
      id: ctx.caller,
      name: registration.name,
      category: registration.category ?? null,
      website: registration.website ?? null,
      location: registration.location ?? null,
      verified: false,
      active: true,
      registeredAt: now,
    };

    await tx.putAuthority(authority);
    return authority;
  }

  /**
   * Set an authority's verified flag. Admin only.
   */
  async setVerified(
    tx: LedgerTransaction<AnyLedgerRecord>,
    ctx: CallContext,
    authorityId: Identity,
    verified: boolean
  ): Promise<Authority> {
    await this.authorizer.requireAdmin(tx, ctx);

    const existing = await tx.getAuthority(authorityId);
    if (!existing) {
      throw new RegistryError("NotFound", `Authority ${authorityId} not found`);
    }

    const updated: Authority = { ...existing, verified };
    await tx.putAuthority(updated);
    return updated;
  }

  /**
   * Require the caller to be a registered, verified authority.
   */
  async requireVerified(
    view: LedgerView<AnyLedgerRecord>,
    ctx: CallContext
  ): Promise<Authority> {
    const authority = await view.getAuthority(ctx.caller);

    if (!authority) {
      throw new RegistryError(
        "NotFound",
        `${ctx.caller} is not a registered authority`
      );
    }

    if (!authority.verified) {
      throw new RegistryError(
        "Unauthorized",
        `Authority ${ctx.caller} is not verified`
      );
    }

    return authority;
  }

  async get(
    view: LedgerView<AnyLedgerRecord>,
    authorityId: Identity
  ): Promise<Authority | null> {
    return view.getAuthority(authorityId);
  }

  async list(view: LedgerView<AnyLedgerRecord>): Promise<Authority[]> {
    return view.listAuthorities();
  }
}
