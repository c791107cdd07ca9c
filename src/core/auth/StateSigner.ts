// src/core/auth/StateSigner.ts

import * as crypto from 'crypto';

/**
 * Compare two strings without leaking where they differ.
 */
export function secureEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    // constant time on length mismatch too
    crypto.timingSafeEqual(left, left);
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

/**
 * HMAC-SHA256 over the authorization state so the callback can be checked
 * without any server-side record of issued states.
 */
export class StateSigner {
  constructor(private secret: string) {
    if (secret.length === 0) {
      throw new Error('State secret must not be empty');
    }
  }

  sign(state: string): string {
    return crypto.createHmac('sha256', this.secret).update(state, 'utf8').digest('hex');
  }

  verify(state: string, signature: string): boolean {
    return secureEqual(this.sign(state), signature);
  }
}
