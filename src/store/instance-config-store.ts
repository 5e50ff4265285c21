import { DuplicateIdError, InstanceNotFoundError } from '../common/errors/index.js';
import type { InstanceId } from '../common/types/ids.js';
import type { InstanceConfig } from '../common/types/instance.js';
import type { StateDocumentStore } from './state-document.js';

/** Fields the orchestrator may change after creation. Identity and creation time are fixed. */
export type InstanceConfigPatch = Partial<Omit<InstanceConfig, 'instanceId' | 'templateId' | 'createdAt' | 'updatedAt'>>;

/**
 * Instance Config Store: the persisted per-instance table.
 *
 * Only the orchestrator writes here; running workers never see the store.
 */
export class InstanceConfigStore {
  constructor(private readonly store: StateDocumentStore) {}

  list(): InstanceConfig[] {
    return this.store.snapshot().instances;
  }

  find(id: InstanceId): InstanceConfig | undefined {
    return this.list().find((i) => i.instanceId === id);
  }

  get(id: InstanceId): InstanceConfig {
    const config = this.find(id);
    if (!config) throw new InstanceNotFoundError(id);
    return config;
  }

  async insert(config: InstanceConfig): Promise<InstanceConfig> {
    await this.store.update((draft) => {
      if (draft.instances.some((i) => i.instanceId === config.instanceId)) {
        throw new DuplicateIdError('Instance', config.instanceId);
      }
      draft.instances.push(config);
    });
    return config;
  }

  async update(id: InstanceId, patch: InstanceConfigPatch): Promise<InstanceConfig> {
    const doc = await this.store.update((draft) => {
      const index = draft.instances.findIndex((i) => i.instanceId === id);
      if (index === -1) throw new InstanceNotFoundError(id);
      draft.instances[index] = { ...draft.instances[index], ...patch, updatedAt: new Date().toISOString() };
    });
    const updated = doc.instances.find((i) => i.instanceId === id);
    if (!updated) throw new InstanceNotFoundError(id);
    return updated;
  }

  async remove(id: InstanceId): Promise<void> {
    await this.store.update((draft) => {
      const index = draft.instances.findIndex((i) => i.instanceId === id);
      if (index === -1) throw new InstanceNotFoundError(id);
      draft.instances.splice(index, 1);
    });
  }
}
