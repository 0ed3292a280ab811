import { describe, it, expect, beforeEach } from "vitest";
import { Authorizer } from "../src/authorization";
import { createPrivilegeRegistry, type PrivilegeRegistry } from "../src/registries";
import { RegistryError } from "../src/types";
import type { PrivilegeRecord } from "../src/types";

const OWNER = { caller: "owner-1" };

describe("Authorizer", () => {
  it("rejects an empty owner", () => {
    expect(() => new Authorizer("")).toThrow(RegistryError);
  });

  it("recognizes only the configured owner", () => {
    const authorizer = new Authorizer("owner-1");

    expect(authorizer.isOwner("owner-1")).toBe(true);
    expect(authorizer.isOwner("owner-2")).toBe(false);
    expect(authorizer.ownerId).toBe("owner-1");
  });

  it("requireOwner throws Unauthorized for anyone else", () => {
    const authorizer = new Authorizer("owner-1");

    expect(() => authorizer.requireOwner({ caller: "admin-1" })).toThrow(
      "Unauthorized: Only the owner can manage admins"
    );
  });

  it("requireRecordAuthority accepts only the record's authority", () => {
    const authorizer = new Authorizer("owner-1");
    const record: PrivilegeRecord = {
      id: 9,
      registry: "privileges",
      subjectId: "provider-1",
      authorityId: "hospital-1",
      payload: { procedureCode: "P-1", procedureName: "Biopsy" },
      createdAt: 0,
      expiresAt: 0,
      verifiedAt: 0,
      lastUpdatedAt: 0,
      status: "active",
      metadata: "",
    };

    expect(() =>
      authorizer.requireRecordAuthority(record, { caller: "hospital-1" })
    ).not.toThrow();

    try {
      authorizer.requireRecordAuthority(record, { caller: "hospital-2" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryError);
      expect(error).toMatchObject({
        code: "Unauthorized",
        reason: "Only authority hospital-1 can modify record 9",
      });
    }
  });
});

describe("admin management", () => {
  let registry: PrivilegeRegistry;

  beforeEach(() => {
    registry = createPrivilegeRegistry({ owner: "owner-1" });
  });

  it("treats unknown identities as non-admins", async () => {
    expect(await registry.isAdmin("nobody")).toBe(false);
  });

  it("does not treat the owner as an admin", async () => {
    expect(await registry.isAdmin("owner-1")).toBe(false);
  });

  it("lets the owner add an admin", async () => {
    const result = await registry.addAdmin(OWNER, "admin-1");

    expect(result).toEqual({ ok: true, value: true });
    expect(await registry.isAdmin("admin-1")).toBe(true);
  });

  it("lets the owner remove an admin", async () => {
    await registry.addAdmin(OWNER, "admin-1");

    const result = await registry.removeAdmin(OWNER, "admin-1");

    expect(result).toEqual({ ok: true, value: true });
    expect(await registry.isAdmin("admin-1")).toBe(false);
  });

  it("rejects addAdmin from a non-owner without changing state", async () => {
    const result = await registry.addAdmin({ caller: "intruder" }, "intruder");

    expect(result).toEqual({
      ok: false,
      code: "Unauthorized",
      reason: "Only the owner can manage admins",
    });
    expect(await registry.isAdmin("intruder")).toBe(false);
  });

  it("rejects removeAdmin from an admin", async () => {
    await registry.addAdmin(OWNER, "admin-1");
    await registry.addAdmin(OWNER, "admin-2");

    const result = await registry.removeAdmin({ caller: "admin-1" }, "admin-2");

    expect(result.ok).toBe(false);
    expect(await registry.isAdmin("admin-2")).toBe(true);
  });

  it("rejects an empty admin identity", async () => {
    const result = await registry.addAdmin(OWNER, "");

    expect(result).toEqual({
      ok: false,
      code: "InvalidInput",
      reason: "identity cannot be empty",
    });
  });

  it("keeps admin sets separate per registry", async () => {
    const other = createPrivilegeRegistry({ owner: "owner-1" });

    await registry.addAdmin(OWNER, "admin-1");

    expect(await other.isAdmin("admin-1")).toBe(false);
  });
});
