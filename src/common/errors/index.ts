/**
 * Error hierarchy for Kennel.
 *
 * Every error has a `code` (machine-readable) and `message` (human-readable).
 * The API layer maps `statusCode` straight onto the HTTP response, and the
 * orchestrator keeps the message of a failed start around for operators.
 */

export class KennelError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'KennelError';
  }
}

// ─── Configuration Errors ──────────────────────────────────────

/** Unknown or unusable template/credential reference. */
export class ConfigError extends KennelError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_ERROR', message, 400, cause);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends KennelError {
  constructor(
    message: string,
    public readonly issues: { path: string; message: string }[] = [],
  ) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

export class DuplicateIdError extends KennelError {
  constructor(entity: string, id: string) {
    super('DUPLICATE_ID', `${entity} already exists: ${id}`, 409);
    this.name = 'DuplicateIdError';
  }
}

// ─── Lookup Errors ─────────────────────────────────────────────

export class InstanceNotFoundError extends KennelError {
  constructor(instanceId: string) {
    super('INSTANCE_NOT_FOUND', `Instance not found: ${instanceId}`, 404);
    this.name = 'InstanceNotFoundError';
  }
}

export class TemplateNotFoundError extends KennelError {
  constructor(templateId: string) {
    super('TEMPLATE_NOT_FOUND', `Template not found: ${templateId}`, 404);
    this.name = 'TemplateNotFoundError';
  }
}

export class CredentialNotFoundError extends KennelError {
  constructor(credentialId: string) {
    super('CREDENTIAL_NOT_FOUND', `Credential not found: ${credentialId}`, 404);
    this.name = 'CredentialNotFoundError';
  }
}

// ─── Conflict Errors ───────────────────────────────────────────

export class TemplateInUseError extends KennelError {
  constructor(templateId: string, instanceIds: string[]) {
    super(
      'TEMPLATE_IN_USE',
      `Template ${templateId} is referenced by ${instanceIds.length} instance(s): ${instanceIds.join(', ')}`,
      409,
    );
    this.name = 'TemplateInUseError';
  }
}

export class CredentialInUseError extends KennelError {
  constructor(credentialId: string, holderId: string) {
    super('CREDENTIAL_IN_USE', `Credential ${credentialId} is already in use by live instance ${holderId}`, 409);
    this.name = 'CredentialInUseError';
  }
}

// ─── Lifecycle Errors ──────────────────────────────────────────

/** The chat gateway refused or failed the connection. Never retried automatically. */
export class ConnectError extends KennelError {
  constructor(instanceId: string, reason: string, cause?: unknown) {
    super('CONNECT_FAILED', `Instance ${instanceId} failed to connect: ${reason}`, 502, cause);
    this.name = 'ConnectError';
  }
}

/** A running worker faulted. Recorded on the instance, not thrown to API callers. */
export class CrashError extends KennelError {
  constructor(instanceId: string, reason: string, cause?: unknown) {
    super('INSTANCE_CRASHED', `Instance ${instanceId} crashed: ${reason}`, 500, cause);
    this.name = 'CrashError';
  }
}

export class InvalidTransitionError extends KennelError {
  constructor(instanceId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Instance ${instanceId} cannot move from ${from} to ${to}`, 500);
    this.name = 'InvalidTransitionError';
  }
}

// ─── Storage Errors ────────────────────────────────────────────

export class StateDocumentError extends KennelError {
  constructor(message: string, cause?: unknown) {
    super('STATE_DOCUMENT_ERROR', message, 500, cause);
    this.name = 'StateDocumentError';
  }
}

export class StorageLockedError extends KennelError {
  constructor(path: string) {
    super('STORAGE_LOCKED', `Isolated storage is already open: ${path}`, 409);
    this.name = 'StorageLockedError';
  }
}

export class VaultError extends KennelError {
  constructor(message: string, cause?: unknown) {
    super('VAULT_ERROR', message, 500, cause);
    this.name = 'VaultError';
  }
}

/** Human-readable reason for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
