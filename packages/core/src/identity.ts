import { RegistryError } from "./types";

/**
 * Caller identity.
 *
 * Opaque, comparable account key. The engine assumes it was authenticated by
 * the host (API key, signature, session) and never inspects its encoding.
 */
export type Identity = string;

export const MAX_IDENTITY_LENGTH = 128;

/**
 * Execution context of one operation.
 *
 * The caller always comes from here, never from an operation argument.
 */
export interface CallContext {
  readonly caller: Identity;
  readonly requestId?: string;
}

export function isIdentity(value: unknown): value is Identity {
  return (
    typeof value === "string" &&
    value.trim() !== "" &&
    value.length <= MAX_IDENTITY_LENGTH
  );
}

/**
 * Build a call context for an authenticated caller.
 */
export function createCallContext(
  caller: Identity,
  options?: { requestId?: string }
): CallContext {
  if (!isIdentity(caller)) {
    throw new RegistryError(
      "InvalidInput",
      `caller must be a non-empty identity of at most ${MAX_IDENTITY_LENGTH} characters`
    );
  }

  return {
    caller,
    requestId: options?.requestId,
  };
}
