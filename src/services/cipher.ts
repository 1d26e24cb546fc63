// src/services/cipher.ts
// What: Authenticated encryption for vault columns.
// How: Derives a 256-bit key from the passphrase with scrypt and a per-vault salt, then seals values with
//      AES-256-GCM as iv | tag | ciphertext. Opening with another key fails authentication instead of
//      returning garbage. The key lives only in memory.

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'crypto';

const KEY_LEN = 32;
const IV_LEN = 12;
const TAG_LEN = 16;
const SALT_LEN = 16;
const SCRYPT_OPTIONS = { N: 1 << 14, r: 8, p: 1 };

export class VaultCipher {
  private constructor(private readonly key: Buffer) {}

  static derive(passphrase: string, salt: Buffer): VaultCipher {
    return new VaultCipher(scryptSync(passphrase, salt, KEY_LEN, SCRYPT_OPTIONS));
  }

  static newSalt(): Buffer {
    return randomBytes(SALT_LEN);
  }

  seal(plain: Buffer): Buffer {
    const iv = randomBytes(IV_LEN);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const body = Buffer.concat([cipher.update(plain), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), body]);
  }

  open(sealed: Buffer): Buffer {
    if (sealed.length < IV_LEN + TAG_LEN) {
      throw new Error('Sealed value is truncated');
    }
    const iv = sealed.subarray(0, IV_LEN);
    const tag = sealed.subarray(IV_LEN, IV_LEN + TAG_LEN);
    const decipher = createDecipheriv('aes-256-gcm', this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(sealed.subarray(IV_LEN + TAG_LEN)), decipher.final()]);
  }

  sealText(text: string): Buffer {
    return this.seal(Buffer.from(text, 'utf8'));
  }

  openText(sealed: Buffer): string {
    return this.open(sealed).toString('utf8');
  }
}
