/**
 * API tokens
 *
 * Tokens are shown once when generated and stored only as scrypt hashes
 * (`scrypt$<salt>$<key>`, base64url). Entries without the prefix are
 * compared as plain text, for configs written by hand.
 */

import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { TokenConfig } from '../config';

const HASH_PREFIX = 'scrypt';
const KEY_LENGTH = 32;
const SALT_BYTES = 16;

export function generateToken(prefix = 'tsk'): string {
  return `${prefix}_${randomBytes(32).toString('base64url')}`;
}

function deriveKey(token: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(token, salt, KEY_LENGTH, (err, key) => {
      if (err) {
        reject(err);
      } else {
        resolve(key);
      }
    });
  });
}

function constantTimeEqual(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export async function hashToken(token: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(token, salt);
  return `${HASH_PREFIX}$${salt.toString('base64url')}$${key.toString('base64url')}`;
}

export async function verifyToken(token: string, stored: string): Promise<boolean> {
  if (!stored.startsWith(`${HASH_PREFIX}$`)) {
    return constantTimeEqual(Buffer.from(token), Buffer.from(stored));
  }
  const parts = stored.split('$');
  if (parts.length !== 3 || !parts[1] || !parts[2]) {
    return false;
  }
  const salt = Buffer.from(parts[1], 'base64url');
  const expected = Buffer.from(parts[2], 'base64url');
  const key = await deriveKey(token, salt);
  return constantTimeEqual(key, expected);
}

/** First configured token the presented value matches. */
export async function findMatchingToken(
  token: string,
  tokens: TokenConfig[]
): Promise<TokenConfig | undefined> {
  for (const candidate of tokens) {
    if (await verifyToken(token, candidate.token_hash)) {
      return candidate;
    }
  }
  return undefined;
}
