import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { env } from '../config/env.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

function toKey(keyHex: string): Buffer {
  const key = Buffer.from(keyHex, 'hex');
  if (key.length !== 32) {
    throw new Error('Encryption key must be 32 bytes (64 hex characters)');
  }
  return key;
}

/**
 * Encrypt text as `iv:authTag:ciphertext`, each part hex-encoded.
 */
export function encrypt(plaintext: string, keyHex: string = env.ENCRYPTION_KEY): string {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, toKey(keyHex), iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return `${iv.toString('hex')}:${authTag.toString('hex')}:${ciphertext.toString('hex')}`;
}

export function decrypt(payload: string, keyHex: string = env.ENCRYPTION_KEY): string {
  const [ivHex, tagHex, dataHex] = payload.trim().split(':');
  if (!ivHex || !tagHex || dataHex === undefined) {
    throw new Error('Encrypted payload is malformed');
  }

  const decipher = createDecipheriv(ALGORITHM, toKey(keyHex), Buffer.from(ivHex, 'hex'));
  decipher.setAuthTag(Buffer.from(tagHex, 'hex'));
  const plaintext = Buffer.concat([decipher.update(Buffer.from(dataHex, 'hex')), decipher.final()]);
  return plaintext.toString('utf8');
}
