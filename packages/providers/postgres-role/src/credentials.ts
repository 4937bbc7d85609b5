import { randomInt } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import { ProviderError } from '@credential-providers/core';

export const PASSWORD_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!$-_*';
export const PASSWORD_LENGTH = 64;

const MAX_OID = 0xffff_ffff;

/**
 * `secrets_manager_` followed by a random UUID with underscores.
 */
export function generateRoleName(): string {
  return `secrets_manager_${uuidv4().replaceAll('-', '_')}`;
}

export function generateRolePassword(length = PASSWORD_LENGTH): string {
  let password = '';
  for (let i = 0; i < length; i++) {
    password += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return password;
}

/**
 * Parses a credential id as a role OID, an unsigned 32-bit integer.
 * @throws {ProviderError} Configuration error for anything else
 */
export function parseRoleOid(credentialId: string): number {
  const oid = /^\d+$/.test(credentialId) ? Number(credentialId) : Number.NaN;
  if (!Number.isSafeInteger(oid) || oid > MAX_OID) {
    throw ProviderError.configuration(
      `credentials id '${credentialId}' is not a role OID (unsigned 32-bit integer)`,
    );
  }
  return oid;
}

/**
 * Connection URL carrying the role's credentials instead of the admin's.
 */
export function composeRoleUrl(composed: string, username: string, password: string): string {
  const url = new URL(composed);
  url.username = username;
  url.password = password;
  return url.toString();
}
