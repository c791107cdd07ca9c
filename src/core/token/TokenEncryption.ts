// src/core/token/TokenEncryption.ts

import * as crypto from 'crypto';

const HEX_KEY = /^[0-9a-f]{64}$/i;

function toKey(hex: string, label: string): Buffer {
  if (!HEX_KEY.test(hex)) {
    throw new Error(`${label} must be a 32-byte hex string (64 hexadecimal characters)`);
  }
  return Buffer.from(hex, 'hex');
}

/**
 * AES-256-GCM envelope for session records at rest.
 * Output format: `iv:authTag:ciphertext`, all hex. Older keys stay readable for rotation.
 */
export class TokenEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = toKey(currentKey, 'Encryption key');
    this.previousKeys = previousKeys.map((key) => toKey(key, 'Previous encryption key'));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return `${iv.toString('hex')}:${authTag.toString('hex')}:${ciphertext.toString('hex')}`;
  }

  decrypt(encrypted: string): string {
    const parts = encrypted.split(':');
    if (parts.length !== 3) {
      throw new Error('Malformed encrypted payload');
    }
    const [iv, authTag, ciphertext] = parts;

    let lastError: unknown;
    for (const key of [this.currentKey, ...this.previousKeys]) {
      try {
        return this.decryptWithKey(iv, authTag, ciphertext, key);
      } catch (error: unknown) {
        lastError = error;
      }
    }
    throw new Error('Failed to decrypt session with any available key', { cause: lastError });
  }

  private decryptWithKey(iv: string, authTag: string, ciphertext: string, key: Buffer): string {
    const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'hex'));
    decipher.setAuthTag(Buffer.from(authTag, 'hex'));
    return Buffer.concat([
      decipher.update(Buffer.from(ciphertext, 'hex')),
      decipher.final(),
    ]).toString('utf8');
  }
}
