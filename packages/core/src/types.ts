// ============================================================================
// REGISTRIES - The three credential registries sharing this engine
// ============================================================================

import type { Identity } from "./identity";
import type {
  PanelPayload,
  PrivilegePayload,
  QualificationPayload,
} from "./validation";

export type RegistryKind = "qualifications" | "privileges" | "panels";

export const REGISTRY_KINDS: readonly RegistryKind[] = [
  "qualifications",
  "privileges",
  "panels",
] as const;

// ============================================================================
// AUTHORITIES - Issuers, hospitals and insurers
// ============================================================================

/**
 * An organization allowed to create records once an admin has verified it.
 *
 * INVARIANT: at most one Authority per identity, keyed by the identity that
 * registered it. Authorities are never deleted.
 */
export interface Authority {
  readonly id: Identity;
  name: string;
  category: string | null; // issuer type, insurer type, null for hospitals
  website: string | null;
  location: string | null;

  // Admin-controlled
  verified: boolean;

  // Set at registration. Nothing clears it yet.
  active: boolean;

  registeredAt: number;
}

export interface AuthorityRegistration {
  name: string;
  category?: string | null;
  website?: string | null;
  location?: string | null;
}

// ============================================================================
// RECORDS - Qualifications, privileges, panel memberships
// ============================================================================

/**
 * Expiration sentinel: a record with this `expiresAt` never expires.
 */
export const NEVER_EXPIRES = 0;

/**
 * A credential record.
 *
 * INVARIANTS:
 * - `id` is allocated from the registry's counter and never reused
 * - `authorityId` is fixed at creation
 * - only the authority named by `authorityId` may mutate status or expiration
 * - every mutation replaces the full record (previous value + changed fields)
 */
export interface LedgerRecord<P, S extends string = string> {
  readonly id: number;
  readonly registry: RegistryKind;
  readonly subjectId: Identity;
  readonly authorityId: Identity;

  // Registry-specific descriptive fields, opaque to the engine
  payload: P;

  // Temporal (ledger time)
  createdAt: number; // issuedAt / grantedAt / effectiveAt
  expiresAt: number; // NEVER_EXPIRES = no expiration
  verifiedAt: number | null;
  lastUpdatedAt: number;

  status: S;

  // Restrictions / notes
  metadata: string;
}

export type AnyLedgerRecord = LedgerRecord<unknown, string>;

/**
 * Qualification status: the two-state verified flag.
 */
export type QualificationStatus = "unverified" | "verified";

export type QualificationRecord = LedgerRecord<
  QualificationPayload,
  QualificationStatus
>;
export type PrivilegeRecord = LedgerRecord<PrivilegePayload>;
export type PanelMembershipRecord = LedgerRecord<PanelPayload>;

/**
 * Input for creating a record (issuance or self-report).
 */
export interface RecordInput<P> {
  payload: P;
  expiresAt: number;
  metadata?: string;
}

/**
 * Statuses the privilege and panel registries conventionally use.
 *
 * Not enforced: any authority may store any status tag. Only "active" makes a
 * record valid.
 */
export const PRIVILEGE_STATUSES = [
  "active",
  "suspended",
  "revoked",
  "expired",
] as const;

export const PANEL_STATUSES = [
  "active",
  "pending",
  "suspended",
  "terminated",
] as const;

// ============================================================================
// RESULTS - What every mutating operation returns
// ============================================================================

export type ErrorCode =
  | "Unauthorized" // caller lacks the role (admin / verified authority / record owner)
  | "AlreadyExists" // identity already has an Authority
  | "NotFound" // authority or record missing
  | "InvalidInput" // input outside its bounds
  | "Expired"; // reserved

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; code: ErrorCode; reason: string };

// ============================================================================
// VALIDITY
// ============================================================================

export type ValidityReason = "valid" | "not_found" | "inactive_status" | "expired";

export interface ValidityReport {
  recordId: number;
  valid: boolean;
  reason: ValidityReason;
  checkedAt: number;
}

// ============================================================================
// AUDIT - Operation records
// ============================================================================

export type AuditOperation =
  | "addAdmin"
  | "removeAdmin"
  | "register"
  | "setVerified"
  | "issue"
  | "selfReport"
  | "verify"
  | "updateStatus"
  | "renew";

export interface AuditEntry {
  id: string;
  timestamp: number; // ledger time of the operation
  registry: RegistryKind;
  operation: AuditOperation;
  actor: Identity;

  outcome: "success" | "failure";
  code?: ErrorCode;
  reason?: string;

  // Correlation
  authorityId?: Identity;
  recordId?: number;
  subjectId?: Identity;
  requestId?: string;

  metadata?: Record<string, unknown>;
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Thrown inside a transaction to abort it. Converted to a failed
 * OperationResult at the registry boundary.
 */
export class RegistryError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly reason: string
  ) {
    super(`${code}: ${reason}`);
    this.name = "RegistryError";

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, RegistryError);
    }
  }
}

/**
 * Return the value of a successful result, or throw the failure as a
 * RegistryError.
 */
export function unwrap<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new RegistryError(result.code, result.reason);
  }
  return result.value;
}
