import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ConsoleAuditLogger,
  MemoryAuditLogger,
  MultiAuditLogger,
  NoOpAuditLogger,
  createAuditLogger,
  type AuditLogger,
} from "../src/audit";
import { HeightClock } from "../src/clock";
import { createPrivilegeRegistry } from "../src/registries";
import type { AuditEntry } from "../src/types";

const entry: AuditEntry = {
  id: "audit-1",
  timestamp: 12,
  registry: "privileges",
  operation: "issue",
  actor: "hospital-1",
  outcome: "success",
  recordId: 1,
};

describe("audit loggers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("MemoryAuditLogger keeps entries in order", () => {
    const logger = new MemoryAuditLogger();

    logger.log(entry);
    logger.log({ ...entry, id: "audit-2" });

    expect(logger.count()).toBe(2);
    expect(logger.getEntries().map((e) => e.id)).toEqual(["audit-1", "audit-2"]);

    logger.clear();
    expect(logger.count()).toBe(0);
  });

  it("ConsoleAuditLogger writes one JSON line", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    new ConsoleAuditLogger().log(entry);

    expect(spy).toHaveBeenCalledWith(JSON.stringify(entry));
  });

  it("NoOpAuditLogger accepts entries", () => {
    expect(() => new NoOpAuditLogger().log(entry)).not.toThrow();
  });

  it("MultiAuditLogger fans out and tolerates a failing destination", async () => {
    const first = new MemoryAuditLogger();
    const second = new MemoryAuditLogger();
    const failing: AuditLogger = {
      log: () => {
        throw new Error("disk full");
      },
    };

    await new MultiAuditLogger([first, failing, second]).log(entry);

    expect(first.getEntries()).toEqual([entry]);
    expect(second.getEntries()).toEqual([entry]);
  });

  describe("createAuditLogger", () => {
    it("defaults to a no-op logger", () => {
      expect(createAuditLogger()).toBeInstanceOf(NoOpAuditLogger);
      expect(createAuditLogger("none")).toBeInstanceOf(NoOpAuditLogger);
    });

    it("builds console and memory loggers", () => {
      expect(createAuditLogger("console")).toBeInstanceOf(ConsoleAuditLogger);
      expect(createAuditLogger("memory")).toBeInstanceOf(MemoryAuditLogger);
    });

    it("passes custom loggers through", () => {
      const custom = new MemoryAuditLogger();

      expect(createAuditLogger(custom)).toBe(custom);
    });
  });
});

describe("registry audit trail", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("records successes with correlation fields", async () => {
    const logger = new MemoryAuditLogger();
    const clock = new HeightClock(4);
    const registry = createPrivilegeRegistry({
      owner: "owner-1",
      clock,
      auditLogger: logger,
    });

    await registry.addAdmin({ caller: "owner-1", requestId: "req-1" }, "admin-1");
    await registry.registerAuthority({ caller: "hospital-1" }, { name: "General" });
    await registry.setAuthorityVerified({ caller: "admin-1" }, "hospital-1", true);
    clock.advance();
    await registry.issue({ caller: "hospital-1" }, "provider-1", {
      payload: { procedureCode: "P-1", procedureName: "Biopsy" },
      expiresAt: 0,
    });

    const entries = logger.getEntries();
    expect(entries.map((e) => e.operation)).toEqual([
      "addAdmin",
      "register",
      "setVerified",
      "issue",
    ]);
    expect(entries[0]).toMatchObject({
      registry: "privileges",
      actor: "owner-1",
      requestId: "req-1",
      outcome: "success",
      timestamp: 4,
    });
    expect(entries[3]).toMatchObject({
      actor: "hospital-1",
      authorityId: "hospital-1",
      subjectId: "provider-1",
      recordId: 1,
      outcome: "success",
      timestamp: 5,
    });
    expect(entries[3].id).toMatch(/^audit-/);
  });

  it("records failures with their code and reason", async () => {
    const logger = new MemoryAuditLogger();
    const registry = createPrivilegeRegistry({ owner: "owner-1", auditLogger: logger });

    await registry.addAdmin({ caller: "intruder" }, "intruder");

    expect(logger.getEntries()).toHaveLength(1);
    expect(logger.getEntries()[0]).toMatchObject({
      operation: "addAdmin",
      actor: "intruder",
      outcome: "failure",
      code: "Unauthorized",
      reason: "Only the owner can manage admins",
    });
  });

  it("does not audit reads", async () => {
    const logger = new MemoryAuditLogger();
    const registry = createPrivilegeRegistry({ owner: "owner-1", auditLogger: logger });

    await registry.isAdmin("admin-1");
    await registry.getRecord(1);
    await registry.isValid(1);

    expect(logger.count()).toBe(0);
  });

  it("keeps the operation result when the logger throws", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const registry = createPrivilegeRegistry({
      owner: "owner-1",
      auditLogger: {
        log: () => {
          throw new Error("audit sink down");
        },
      },
    });

    const result = await registry.addAdmin({ caller: "owner-1" }, "admin-1");

    expect(result).toEqual({ ok: true, value: true });
    expect(await registry.isAdmin("admin-1")).toBe(true);
  });
});
