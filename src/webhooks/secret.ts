import { randomBytes } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

// Largest multiple of the alphabet size that fits in a byte; bytes above it
// are rejected so every character is equally likely.
const UNBIASED_LIMIT = 256 - (256 % ALPHABET.length);

export const SECRET_LENGTH = 32;

/** Random alphanumeric signing secret. */
export function generateSecret(length = SECRET_LENGTH): string {
  let secret = '';
  while (secret.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= UNBIASED_LIMIT) continue;
      secret += ALPHABET.charAt(byte % ALPHABET.length);
      if (secret.length === length) break;
    }
  }
  return secret;
}
