import { createHash } from 'crypto';
import { nanoid } from 'nanoid';

const ACCOUNT_ID_LENGTH = 12;
const API_KEY_LENGTH = 32;

/**
 * Identity for a new account.
 */
export function generateAccountIdentity(): string {
  return `acct-${nanoid(ACCOUNT_ID_LENGTH)}`;
}

export function generateApiKey(): string {
  return `sk-${nanoid(API_KEY_LENGTH)}`;
}

export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}
