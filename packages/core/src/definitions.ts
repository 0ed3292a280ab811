import type { z } from "zod";
import type { QualificationStatus, RegistryKind } from "./types";
import type {
  PanelPayload,
  PrivilegePayload,
  QualificationPayload,
} from "./validation";
import {
  panelPayloadSchema,
  privilegePayloadSchema,
  qualificationPayloadSchema,
  qualificationStatusSchema,
  statusTagSchema,
} from "./validation";

/**
 * What distinguishes one registry from another. The engine is otherwise
 * identical across registries.
 */
export interface RegistryDefinition<P, S extends string> {
  kind: RegistryKind;

  // Singular noun used in messages ("privilege 4 not found")
  recordLabel: string;

  payloadSchema: z.ZodType<P>;
  statusSchema: z.ZodType<S>;

  // Status of authority-issued records
  issuedStatus: S;

  // The only status that makes a record valid (exact match)
  activeStatus: S;

  // Status of self-reported records, for registries that accept them
  selfReportStatus?: S;
}

export const qualificationRegistry: RegistryDefinition<
  QualificationPayload,
  QualificationStatus
> = {
  kind: "qualifications",
  recordLabel: "qualification",
  payloadSchema: qualificationPayloadSchema,
  statusSchema: qualificationStatusSchema,
  issuedStatus: "verified",
  activeStatus: "verified",
  selfReportStatus: "unverified",
};

export const privilegeRegistry: RegistryDefinition<PrivilegePayload, string> = {
  kind: "privileges",
  recordLabel: "privilege",
  payloadSchema: privilegePayloadSchema,
  statusSchema: statusTagSchema,
  issuedStatus: "active",
  activeStatus: "active",
};

export const panelRegistry: RegistryDefinition<PanelPayload, string> = {
  kind: "panels",
  recordLabel: "panel membership",
  payloadSchema: panelPayloadSchema,
  statusSchema: statusTagSchema,
  issuedStatus: "active",
  activeStatus: "active",
};
