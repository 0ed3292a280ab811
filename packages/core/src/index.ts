// Types
export type {
  RegistryKind,
  Authority,
  AuthorityRegistration,
  LedgerRecord,
  AnyLedgerRecord,
  QualificationStatus,
  QualificationRecord,
  PrivilegeRecord,
  PanelMembershipRecord,
  RecordInput,
  ErrorCode,
  OperationResult,
  ValidityReason,
  ValidityReport,
  AuditOperation,
  AuditEntry,
} from "./types";
export {
  REGISTRY_KINDS,
  NEVER_EXPIRES,
  PRIVILEGE_STATUSES,
  PANEL_STATUSES,
  RegistryError,
  unwrap,
} from "./types";

// Identity
export type { Identity, CallContext } from "./identity";
export { createCallContext, isIdentity, MAX_IDENTITY_LENGTH } from "./identity";

// Validation
export type {
  QualificationPayload,
  PrivilegePayload,
  PanelPayload,
} from "./validation";
export {
  TEXT_LIMITS,
  MAX_SPECIALTIES,
  identitySchema,
  ledgerTimeSchema,
  qualificationPayloadSchema,
  privilegePayloadSchema,
  panelPayloadSchema,
  qualificationStatusSchema,
  statusTagSchema,
  parseInput,
} from "./validation";

// Clocks
export type { LedgerClock } from "./clock";
export { HeightClock, EpochClock } from "./clock";

// Stores
export type {
  LedgerStore,
  LedgerView,
  LedgerTransaction,
  RecordFilter,
} from "./store/types";
export { MemoryLedgerStore } from "./store/memory";

// Engine components
export { Authorizer } from "./authorization";
export { AuthorityRegistry } from "./authorities";
export { RecordLedger } from "./ledger";
export { hasExpired, evaluateValidity, isRecordValid } from "./validity";

// Registry definitions
export type { RegistryDefinition } from "./definitions";
export {
  qualificationRegistry,
  privilegeRegistry,
  panelRegistry,
} from "./definitions";

// Audit Loggers
export type { AuditLogger, AuditLoggerConfig } from "./audit";
export {
  ConsoleAuditLogger,
  MemoryAuditLogger,
  NoOpAuditLogger,
  MultiAuditLogger,
  createAuditLogger,
} from "./audit";

// Registries (recommended entry point)
export { CredentialRegistry } from "./registry";
export type { CredentialRegistryConfig } from "./registry";
export {
  QualificationRegistry,
  StatusTrackedRegistry,
  createQualificationRegistry,
  createPrivilegeRegistry,
  createPanelRegistry,
  createRegistrySuite,
} from "./registries";
export type {
  PrivilegeRegistry,
  PanelRegistry,
  RegistrySuite,
  RegistrySuiteConfig,
} from "./registries";
