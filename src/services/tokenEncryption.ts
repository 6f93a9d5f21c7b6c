import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'node:crypto';
import { ConfigurationError, DecryptionError } from '../shared/errors.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const PBKDF2_ITERATIONS = 100_000;
const PBKDF2_DIGEST = 'sha256';
const VERSION_PREFIX = 'v1.';
const MIN_SECRET_LENGTH = 32;

export interface TokenCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
  isEncrypted(value: string): boolean;
}

/**
 * AES-256-GCM over a PBKDF2-derived key. Output is `v1.` followed by
 * base64url(iv || tag || ciphertext). The GCM tag makes any tampering,
 * truncation or wrong key surface as a DecryptionError.
 *
 * The derived key only lives inside the closure and is never logged.
 */
export const createTokenCipher = (secret: string, salt: string): TokenCipher => {
  const issues: string[] = [];
  if (!secret || secret.length < MIN_SECRET_LENGTH) {
    issues.push(`ENCRYPTION_KEY must be at least ${MIN_SECRET_LENGTH} characters`);
  }
  if (!salt) {
    issues.push('ENCRYPTION_SALT is required');
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const key = pbkdf2Sync(secret, salt, PBKDF2_ITERATIONS, KEY_LENGTH, PBKDF2_DIGEST);

  const encrypt = (plaintext: string): string => {
    if (!plaintext) {
      return '';
    }
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return `${VERSION_PREFIX}${Buffer.concat([iv, tag, encrypted]).toString('base64url')}`;
  };

  const decrypt = (ciphertext: string): string => {
    if (!ciphertext) {
      return '';
    }
    if (!ciphertext.startsWith(VERSION_PREFIX)) {
      throw new DecryptionError('unsupported format');
    }
    const payload = Buffer.from(ciphertext.slice(VERSION_PREFIX.length), 'base64url');
    if (payload.length <= IV_LENGTH + TAG_LENGTH) {
      throw new DecryptionError('payload too short');
    }
    const iv = payload.subarray(0, IV_LENGTH);
    const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const encrypted = payload.subarray(IV_LENGTH + TAG_LENGTH);
    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
    } catch {
      throw new DecryptionError('authentication tag mismatch');
    }
  };

  const isEncrypted = (value: string) =>
    value.startsWith(VERSION_PREFIX) && value.length > VERSION_PREFIX.length + IV_LENGTH + TAG_LENGTH;

  return { encrypt, decrypt, isEncrypted };
};
