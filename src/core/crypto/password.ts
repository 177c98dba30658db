// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { argon2id, hash, verify } from 'argon2';

const HASH_OPTIONS = {
  type: argon2id,
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 4,
} as const;

export async function hashPassword(password: string): Promise<string> {
  return hash(password, HASH_OPTIONS);
}

/**
 * Returns false for a mismatch and for a stored value that is not an argon2
 * hash at all, such as a plaintext password left by an older script.
 */
export async function verifyPassword(storedHash: string, password: string): Promise<boolean> {
  if (!isPasswordHash(storedHash)) {
    return false;
  }
  return verify(storedHash, password);
}

export function isPasswordHash(value: string): boolean {
  return value.startsWith('$argon2');
}
