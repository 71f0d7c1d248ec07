// src/core/credentials/SecretEncryption.ts

import * as crypto from 'crypto';

const KEY_PATTERN = /^[0-9a-f]{64}$/i;

/**
 * AES-256-GCM encryption for stored app secrets, with read-only fallback keys for rotation.
 */
export class SecretEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    if (!KEY_PATTERN.test(currentKey)) {
      throw new Error('Encryption key must be a 32-byte hex string (64 hexadecimal characters)');
    }

    this.currentKey = Buffer.from(currentKey, 'hex');

    this.previousKeys = previousKeys.map((k) => {
      if (!KEY_PATTERN.test(k)) {
        throw new Error(
          'All previous encryption keys must be 32-byte hex strings (64 hexadecimal characters)'
        );
      }
      return Buffer.from(k, 'hex');
    });
  }

  encrypt(plaintext: string): string {
    return this.encryptWithKey(plaintext, this.currentKey);
  }

  decrypt(encrypted: string): string {
    for (const key of [this.currentKey, ...this.previousKeys]) {
      try {
        return this.decryptWithKey(encrypted, key);
      } catch {
        continue;
      }
    }
    throw new Error('Failed to decrypt secret with any available key');
  }

  private encryptWithKey(plaintext: string, key: Buffer): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();

    // Format: iv:authTag:ciphertext
    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
  }

  private decryptWithKey(encrypted: string, key: Buffer): string {
    const [ivHex, authTagHex, ciphertext] = encrypted.split(':');
    if (!ivHex || !authTagHex || ciphertext === undefined) {
      throw new Error('Malformed encrypted payload');
    }

    const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(ivHex, 'hex'));
    decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

    let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return decrypted;
  }
}
