import type { CredentialId, InstanceId } from '../common/types/ids.js';
import type { InstanceConfig } from '../common/types/instance.js';
import type { StateDocument } from '../store/state-document.js';

/**
 * What a state document edit means for one instance. At most one action is
 * planned per instance, in priority order remove > stop > restart > start > apply.
 */
export type ReloadAction =
  | { kind: 'remove'; instanceId: InstanceId }
  | { kind: 'stop'; instanceId: InstanceId }
  | { kind: 'restart'; instanceId: InstanceId; reason: string }
  | { kind: 'start'; instanceId: InstanceId }
  | { kind: 'apply'; instanceId: InstanceId; fields: LiveField[] };

/** Fields that take effect on a running worker without a reconnect. */
const LIVE_FIELDS = ['name', 'personalityOverride', 'personality', 'features', 'settings', 'autoStart'] as const;
export type LiveField = (typeof LIVE_FIELDS)[number];

export function planReload(previous: StateDocument, next: StateDocument): ReloadAction[] {
  const actions: ReloadAction[] = [];
  const before = new Map(previous.instances.map((i) => [i.instanceId, i]));
  const after = new Map(next.instances.map((i) => [i.instanceId, i]));

  for (const id of before.keys()) {
    if (!after.has(id)) actions.push({ kind: 'remove', instanceId: id });
  }

  for (const [id, config] of after) {
    const prior = before.get(id);
    if (!prior) {
      if (config.desiredState === 'running') actions.push({ kind: 'start', instanceId: id });
      continue;
    }
    const action = planInstance(prior, config, previous, next);
    if (action) actions.push(action);
  }

  return actions;
}

function planInstance(
  prior: InstanceConfig,
  config: InstanceConfig,
  previous: StateDocument,
  next: StateDocument,
): ReloadAction | null {
  const id = config.instanceId;

  if (config.desiredState === 'stopped' && prior.desiredState !== 'stopped') {
    return { kind: 'stop', instanceId: id };
  }
  if (prior.credentialId !== config.credentialId) {
    return { kind: 'restart', instanceId: id, reason: 'credential reference changed' };
  }
  if (secretOf(previous, config.credentialId) !== secretOf(next, config.credentialId)) {
    return { kind: 'restart', instanceId: id, reason: 'credential secret changed' };
  }
  if (config.desiredState === 'running' && prior.desiredState !== 'running') {
    return { kind: 'start', instanceId: id };
  }

  const fields = LIVE_FIELDS.filter((field) => JSON.stringify(prior[field]) !== JSON.stringify(config[field]));
  return fields.length > 0 ? { kind: 'apply', instanceId: id, fields } : null;
}

function secretOf(doc: StateDocument, id: CredentialId): string | null {
  const record = doc.credentials.find((c) => c.credentialId === id);
  return record ? JSON.stringify(record.secret) : null;
}

/** Instances to start at process start. Only the operator's autoStart flag counts. */
export function planBoot(instances: readonly InstanceConfig[]): InstanceId[] {
  return instances.filter((i) => i.autoStart).map((i) => i.instanceId);
}
