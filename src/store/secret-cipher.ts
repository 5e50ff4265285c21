import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { VaultError } from '../common/errors/index.js';
import type { EncryptedPayload } from '../common/types/credential.js';

const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;

/**
 * Seals credential secrets with AES-256-GCM under the process credential key.
 *
 * The credential id is bound in as associated data, so a sealed secret only
 * opens for the record it was written to. Payload fields are hex strings to
 * keep the state document hand-editable.
 */
export class SecretCipher {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new VaultError('Credential key must be 32 bytes (a 64-character hex string)');
    }
    this.key = key;
  }

  seal(plaintext: string, owner: string): EncryptedPayload {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv('aes-256-gcm', this.key, nonce, { authTagLength: TAG_BYTES });
    cipher.setAAD(Buffer.from(owner, 'utf8'));
    const sealed = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return {
      iv: nonce.toString('hex'),
      authTag: cipher.getAuthTag().toString('hex'),
      ciphertext: sealed.toString('hex'),
    };
  }

  /** @throws {VaultError} when the payload was altered, sealed for another owner, or under another key */
  open(payload: EncryptedPayload, owner: string): string {
    const decipher = createDecipheriv('aes-256-gcm', this.key, Buffer.from(payload.iv, 'hex'), {
      authTagLength: TAG_BYTES,
    });
    decipher.setAAD(Buffer.from(owner, 'utf8'));
    decipher.setAuthTag(Buffer.from(payload.authTag, 'hex'));

    try {
      return Buffer.concat([decipher.update(Buffer.from(payload.ciphertext, 'hex')), decipher.final()]).toString('utf8');
    } catch (err) {
      throw new VaultError('Secret could not be opened: wrong key or altered payload', err);
    }
  }
}
