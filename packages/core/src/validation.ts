import { z } from "zod";
import { MAX_IDENTITY_LENGTH } from "./identity";
import { RegistryError } from "./types";

/**
 * Input bounds
 *
 * Every text field a registry stores is length-bounded. Inputs outside their
 * bounds are rejected with InvalidInput before anything is written.
 */
export const TEXT_LIMITS = {
  name: 100,
  typeTag: 50,
  metadata: 500,
  shortTag: 20,
} as const;

export const MAX_SPECIALTIES = 10;

const boundedText = (max: number, label: string) =>
  z
    .string()
    .min(1, `${label} cannot be empty`)
    .max(max, `${label} must be at most ${max} characters`);

const optionalText = (max: number, label: string) =>
  z.string().max(max, `${label} must be at most ${max} characters`).optional();

export const identitySchema = z
  .string()
  .regex(/\S/, "identity cannot be empty")
  .max(MAX_IDENTITY_LENGTH, `identity must be at most ${MAX_IDENTITY_LENGTH} characters`);

/**
 * Ledger time: non-negative integer. For expirations, 0 means "never".
 */
export const ledgerTimeSchema = z
  .number()
  .int("ledger time must be an integer")
  .nonnegative("ledger time cannot be negative")
  .max(Number.MAX_SAFE_INTEGER);

export const metadataSchema = z
  .string()
  .max(TEXT_LIMITS.metadata, `metadata must be at most ${TEXT_LIMITS.metadata} characters`);

export const authorityRegistrationSchema = z.object({
  name: boundedText(TEXT_LIMITS.name, "name"),
  category: boundedText(TEXT_LIMITS.typeTag, "category").nullish(),
  website: boundedText(TEXT_LIMITS.name, "website").nullish(),
  location: boundedText(TEXT_LIMITS.name, "location").nullish(),
});

// ============================================================================
// PAYLOADS
// ============================================================================

export const qualificationPayloadSchema = z.object({
  qualificationType: boundedText(TEXT_LIMITS.typeTag, "qualificationType"),
  name: boundedText(TEXT_LIMITS.name, "name"),
  licenseNumber: optionalText(TEXT_LIMITS.typeTag, "licenseNumber"),
  jurisdiction: optionalText(TEXT_LIMITS.typeTag, "jurisdiction"),
});

export const privilegePayloadSchema = z.object({
  procedureCode: boundedText(TEXT_LIMITS.shortTag, "procedureCode"),
  procedureName: boundedText(TEXT_LIMITS.name, "procedureName"),
  department: optionalText(TEXT_LIMITS.typeTag, "department"),
});

export const panelPayloadSchema = z.object({
  networkName: boundedText(TEXT_LIMITS.name, "networkName"),
  tier: boundedText(TEXT_LIMITS.shortTag, "tier"),
  specialties: z
    .array(boundedText(TEXT_LIMITS.typeTag, "specialty"))
    .max(MAX_SPECIALTIES, `at most ${MAX_SPECIALTIES} specialties`),
});

export type QualificationPayload = z.infer<typeof qualificationPayloadSchema>;
export type PrivilegePayload = z.infer<typeof privilegePayloadSchema>;
export type PanelPayload = z.infer<typeof panelPayloadSchema>;

// ============================================================================
// STATUSES
// ============================================================================

export const qualificationStatusSchema = z.enum(["unverified", "verified"]);

/**
 * Free-text status tag. Not a closed vocabulary.
 */
export const statusTagSchema = boundedText(TEXT_LIMITS.shortTag, "status");

/**
 * Parse `value` against `schema`, throwing InvalidInput with the first issue.
 */
export function parseInput<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    const issue = result.error.errors[0];
    const field = issue.path.join(".");

    throw new RegistryError(
      "InvalidInput",
      field ? `Field '${field}': ${issue.message}` : issue.message
    );
  }

  return result.data;
}
