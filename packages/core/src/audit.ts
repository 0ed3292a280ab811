import type { AuditEntry } from "./types";

/**
 * Audit logger interface.
 *
 * Receives one entry per mutating operation, after its transaction settles.
 * Implementations must not throw: a failing logger never changes the
 * operation's result.
 */
export interface AuditLogger {
  log(entry: AuditEntry): void | Promise<void>;
}

/**
 * Console logger - logs to stdout as JSON.
 */
export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditEntry): void {
    try {
      console.log(JSON.stringify(entry));
    } catch (err) {
      console.error("[AUDIT ERROR]", err);
    }
  }
}

/**
 * Memory logger - stores entries in memory (for testing).
 */
export class MemoryAuditLogger implements AuditLogger {
  private entries: AuditEntry[] = [];

  log(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  count(): number {
    return this.entries.length;
  }
}

/**
 * No-op logger - discards all entries.
 */
export class NoOpAuditLogger implements AuditLogger {
  log(_entry: AuditEntry): void {
    // Intentionally empty
  }
}

/**
 * Multi logger - logs to multiple destinations.
 */
export class MultiAuditLogger implements AuditLogger {
  constructor(private loggers: AuditLogger[]) {}

  async log(entry: AuditEntry): Promise<void> {
    // Individual failures are ignored; the other destinations still get the entry
    await Promise.allSettled(
      this.loggers.map((logger) =>
        Promise.resolve().then(() => logger.log(entry))
      )
    );
  }
}

/**
 * Audit logger configuration.
 */
export type AuditLoggerConfig =
  | "console" // Log to console
  | "memory" // Store in memory (testing)
  | "none" // No logging
  | AuditLogger; // Custom logger

export function createAuditLogger(config?: AuditLoggerConfig): AuditLogger {
  if (!config || config === "none") {
    return new NoOpAuditLogger();
  }

  if (config === "console") {
    return new ConsoleAuditLogger();
  }

  if (config === "memory") {
    return new MemoryAuditLogger();
  }

  return config;
}
