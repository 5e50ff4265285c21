import path from 'node:path';
import type { CredentialId } from '../common/types/ids.js';

/**
 * Directory name for a credential's isolated storage.
 *
 * Hex of the UTF-8 bytes rather than a hash prefix: the mapping is injective,
 * so two different credential references can never land in the same
 * directory, and the output is lowercase so case-insensitive filesystems
 * keep it distinct too.
 */
export function isolationKey(credentialId: CredentialId): string {
  return `cred-${Buffer.from(credentialId, 'utf8').toString('hex')}`;
}

/** Deterministic storage location for whichever instance runs on this credential. */
export function deriveIsolationPath(dataDir: string, credentialId: CredentialId): string {
  return path.join(dataDir, 'instances', isolationKey(credentialId));
}
