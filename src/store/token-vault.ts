import { v4 as uuidv4 } from 'uuid';
import {
  ConfigError,
  CredentialNotFoundError,
  DuplicateIdError,
  VaultError,
  describeError,
} from '../common/errors/index.js';
import type {
  CredentialCreateInput,
  CredentialRecord,
  CredentialSummary,
  ResolvedCredential,
  StoredSecret,
} from '../common/types/credential.js';
import { credentialId, type CredentialId } from '../common/types/ids.js';
import { SecretCipher } from './secret-cipher.js';
import type { StateDocumentStore } from './state-document.js';

/**
 * Token Vault: credential records keyed by reference id.
 *
 * Instances never hold a secret, only a `credentialId`. The orchestrator asks
 * the vault to resolve that reference at start time; unknown and inactive
 * references are rejected there with a ConfigError.
 */
export class TokenVault {
  private readonly cipher: SecretCipher | null;

  constructor(
    private readonly store: StateDocumentStore,
    key: Buffer | null,
  ) {
    this.cipher = key ? new SecretCipher(key) : null;
  }

  list(): CredentialSummary[] {
    return this.store.snapshot().credentials.map(toSummary);
  }

  get(id: string): CredentialSummary {
    return toSummary(this.getRecord(id));
  }

  async create(input: CredentialCreateInput): Promise<CredentialSummary> {
    const id = credentialId(input.credentialId ?? uuidv4());
    const record: CredentialRecord = {
      credentialId: id,
      name: input.name,
      secret: this.cipher ? this.cipher.seal(input.secret, id) : input.secret,
      active: true,
      createdAt: new Date().toISOString(),
    };

    await this.store.update((draft) => {
      if (draft.credentials.some((c) => c.credentialId === id)) {
        throw new DuplicateIdError('Credential', id);
      }
      draft.credentials.push(record);
    });
    return toSummary(record);
  }

  /** Running instances keep their connection; the credential just can't be used for a new start. */
  async deactivate(id: string): Promise<CredentialSummary> {
    const doc = await this.store.update((draft) => {
      const record = draft.credentials.find((c) => c.credentialId === id);
      if (!record) throw new CredentialNotFoundError(id);
      record.active = false;
    });
    return toSummary(findOrThrow(doc.credentials, id));
  }

  /**
   * Resolve a reference to a usable secret.
   * @throws {ConfigError} when the reference is unknown, inactive or undecryptable
   */
  resolve(id: CredentialId): ResolvedCredential {
    const record = this.store.snapshot().credentials.find((c) => c.credentialId === id);
    if (!record) {
      throw new ConfigError(`Unknown credential reference: ${id}`);
    }
    if (!record.active) {
      throw new ConfigError(`Credential ${id} is inactive`);
    }
    return { credentialId: record.credentialId, name: record.name, secret: this.reveal(record.secret, id) };
  }

  /** Validates a reference without revealing the secret. */
  assertUsable(id: CredentialId): void {
    this.resolve(id);
  }

  private reveal(secret: StoredSecret, id: string): string {
    if (typeof secret === 'string') return secret;
    if (!this.cipher) {
      throw new ConfigError(`Credential ${id} is encrypted but no credential key is configured`);
    }
    try {
      return this.cipher.open(secret, id);
    } catch (err) {
      if (err instanceof VaultError) {
        throw new ConfigError(`Credential ${id} cannot be decrypted: ${describeError(err)}`, err);
      }
      throw err;
    }
  }

  private getRecord(id: string): CredentialRecord {
    return findOrThrow(this.store.snapshot().credentials, id);
  }
}

function findOrThrow(records: CredentialRecord[], id: string): CredentialRecord {
  const record = records.find((c) => c.credentialId === id);
  if (!record) throw new CredentialNotFoundError(id);
  return record;
}

function toSummary(record: CredentialRecord): CredentialSummary {
  return {
    credentialId: record.credentialId,
    name: record.name,
    active: record.active,
    encrypted: typeof record.secret !== 'string',
    createdAt: record.createdAt,
  };
}
