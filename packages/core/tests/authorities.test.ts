import { describe, it, expect, beforeEach } from "vitest";
import { HeightClock } from "../src/clock";
import { createPanelRegistry, type PanelRegistry } from "../src/registries";

const OWNER = { caller: "owner-1" };
const ADMIN = { caller: "admin-1" };
const INSURER = { caller: "insurer-1" };

describe("authority registry", () => {
  let clock: HeightClock;
  let registry: PanelRegistry;

  beforeEach(async () => {
    clock = new HeightClock(5);
    registry = createPanelRegistry({ owner: "owner-1", clock });
    await registry.addAdmin(OWNER, "admin-1");
  });

  describe("registerAuthority", () => {
    it("registers the caller as an unverified, active authority", async () => {
      const result = await registry.registerAuthority(INSURER, {
        name: "Northwind Health",
        category: "commercial",
        website: "https://northwind.example",
        location: "Springfield",
      });

      expect(result).toEqual({
        ok: true,
        value: {
          id: "insurer-1",
          name: "Northwind Health",
          category: "commercial",
          website: "https://northwind.example",
          location: "Springfield",
          verified: false,
          active: true,
          registeredAt: 5,
        },
      });
    });

    it("defaults optional descriptive fields to null", async () => {
      await registry.registerAuthority(INSURER, { name: "Northwind Health" });

      const authority = await registry.getAuthority("insurer-1");
      expect(authority?.category).toBeNull();
      expect(authority?.website).toBeNull();
      expect(authority?.location).toBeNull();
    });

    it("returns AlreadyExists on a second registration", async () => {
      await registry.registerAuthority(INSURER, { name: "Northwind Health" });

      const second = await registry.registerAuthority(INSURER, {
        name: "Renamed Health",
      });

      expect(second).toEqual({
        ok: false,
        code: "AlreadyExists",
        reason: "Authority insurer-1 is already registered",
      });
    });

    it("leaves the first registration untouched after a duplicate attempt", async () => {
      await registry.registerAuthority(INSURER, { name: "Northwind Health" });
      await registry.setAuthorityVerified(ADMIN, "insurer-1", true);

      await registry.registerAuthority(INSURER, { name: "Renamed Health" });

      const authority = await registry.getAuthority("insurer-1");
      expect(authority?.name).toBe("Northwind Health");
      expect(authority?.verified).toBe(true);
      expect(authority?.active).toBe(true);
    });

    it("rejects a name longer than 100 characters", async () => {
      const result = await registry.registerAuthority(INSURER, {
        name: "x".repeat(101),
      });

      expect(result).toEqual({
        ok: false,
        code: "InvalidInput",
        reason: "Field 'name': name must be at most 100 characters",
      });
      expect(await registry.getAuthority("insurer-1")).toBeNull();
    });

    it("accepts a name of exactly 100 characters", async () => {
      const result = await registry.registerAuthority(INSURER, {
        name: "x".repeat(100),
      });

      expect(result.ok).toBe(true);
    });
  });

  describe("setAuthorityVerified", () => {
    beforeEach(async () => {
      await registry.registerAuthority(INSURER, {
        name: "Northwind Health",
        category: "commercial",
      });
    });

    it("lets an admin verify an authority", async () => {
      const result = await registry.setAuthorityVerified(ADMIN, "insurer-1", true);

      expect(result.ok).toBe(true);
      expect((await registry.getAuthority("insurer-1"))?.verified).toBe(true);
    });

    it("lets an admin revoke verification", async () => {
      await registry.setAuthorityVerified(ADMIN, "insurer-1", true);

      await registry.setAuthorityVerified(ADMIN, "insurer-1", false);

      expect((await registry.getAuthority("insurer-1"))?.verified).toBe(false);
    });

    it("changes only the verified flag", async () => {
      const before = await registry.getAuthority("insurer-1");

      clock.advance(10);
      await registry.setAuthorityVerified(ADMIN, "insurer-1", true);

      const after = await registry.getAuthority("insurer-1");
      expect(after).toEqual({ ...before, verified: true });
    });

    it("rejects non-admin callers", async () => {
      const result = await registry.setAuthorityVerified(INSURER, "insurer-1", true);

      expect(result).toEqual({
        ok: false,
        code: "Unauthorized",
        reason: "insurer-1 is not an admin",
      });
      expect((await registry.getAuthority("insurer-1"))?.verified).toBe(false);
    });

    it("rejects the owner when the owner is not an admin", async () => {
      const result = await registry.setAuthorityVerified(OWNER, "insurer-1", true);

      expect(result.ok).toBe(false);
    });

    it("rejects a removed admin", async () => {
      await registry.removeAdmin(OWNER, "admin-1");

      const result = await registry.setAuthorityVerified(ADMIN, "insurer-1", true);

      expect(result).toMatchObject({ ok: false, code: "Unauthorized" });
    });

    it("returns NotFound for an unknown authority", async () => {
      const result = await registry.setAuthorityVerified(ADMIN, "insurer-9", true);

      expect(result).toEqual({
        ok: false,
        code: "NotFound",
        reason: "Authority insurer-9 not found",
      });
    });

    it("checks admin rights before existence", async () => {
      const result = await registry.setAuthorityVerified(INSURER, "insurer-9", true);

      expect(result).toMatchObject({ ok: false, code: "Unauthorized" });
    });
  });

  describe("getAuthority / listAuthorities", () => {
    it("returns null for an unknown authority", async () => {
      expect(await registry.getAuthority("insurer-9")).toBeNull();
    });

    it("lists authorities in registration order", async () => {
      await registry.registerAuthority({ caller: "insurer-2" }, { name: "B" });
      await registry.registerAuthority(INSURER, { name: "A" });

      const all = await registry.listAuthorities();

      expect(all.map((a) => a.id)).toEqual(["insurer-2", "insurer-1"]);
    });
  });
});
