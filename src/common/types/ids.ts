/**
 * Branded ID types prevent accidentally passing a credential id where an
 * instance id is expected. The three tables of the state document all key on
 * plain strings, so the brand is the only thing telling them apart.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type InstanceId = Brand<string, 'InstanceId'>;
export type TemplateId = Brand<string, 'TemplateId'>;
export type CredentialId = Brand<string, 'CredentialId'>;

export function instanceId(id: string): InstanceId {
  return id as InstanceId;
}

export function templateId(id: string): TemplateId {
  return id as TemplateId;
}

export function credentialId(id: string): CredentialId {
  return id as CredentialId;
}
