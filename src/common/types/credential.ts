import type { CredentialId } from './ids.js';

/** AES-256-GCM output, hex-encoded. */
export interface EncryptedPayload {
  iv: string;
  authTag: string;
  ciphertext: string;
}

/**
 * Stored secret. Records created through the API are encrypted when a vault
 * key is configured; a plain string is what an operator writes by hand.
 */
export type StoredSecret = string | EncryptedPayload;

export interface CredentialRecord {
  credentialId: CredentialId;
  name: string;
  secret: StoredSecret;
  active: boolean;
  createdAt: string;
}

/** Listing shape. The secret never leaves the vault. */
export interface CredentialSummary {
  credentialId: CredentialId;
  name: string;
  active: boolean;
  encrypted: boolean;
  createdAt: string;
}

export interface ResolvedCredential {
  credentialId: CredentialId;
  name: string;
  secret: string;
}

export interface CredentialCreateInput {
  credentialId?: string;
  name: string;
  secret: string;
}
