import type { AnyLedgerRecord, ValidityReport } from "./types";
import { NEVER_EXPIRES } from "./types";

/**
 * Expiration check. A record expiring at T is expired from T onwards.
 */
export function hasExpired(expiresAt: number, now: number): boolean {
  return expiresAt !== NEVER_EXPIRES && expiresAt <= now;
}

/**
 * Explain whether a record is currently usable.
 *
 * Pure: same record, time and active status always give the same answer.
 */
export function evaluateValidity(
  recordId: number,
  record: AnyLedgerRecord | null,
  now: number,
  activeStatus: string
): ValidityReport {
  if (!record) {
    return { recordId, valid: false, reason: "not_found", checkedAt: now };
  }

  if (record.status !== activeStatus) {
    return { recordId, valid: false, reason: "inactive_status", checkedAt: now };
  }

  if (hasExpired(record.expiresAt, now)) {
    return { recordId, valid: false, reason: "expired", checkedAt: now };
  }

  return { recordId, valid: true, reason: "valid", checkedAt: now };
}

/**
 * Status is active AND not expired. Absent records are never valid.
 */
export function isRecordValid(
  record: AnyLedgerRecord | null,
  now: number,
  activeStatus: string
): boolean {
  return (
    record !== null &&
    record.status === activeStatus &&
    !hasExpired(record.expiresAt, now)
  );
}
