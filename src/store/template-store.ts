import { v4 as uuidv4 } from 'uuid';
import {
  DuplicateIdError,
  TemplateInUseError,
  TemplateNotFoundError,
} from '../common/errors/index.js';
import { templateId } from '../common/types/ids.js';
import {
  DEFAULT_FEATURES,
  type Template,
  type TemplateCreateInput,
  type TemplateUpdateInput,
} from '../common/types/template.js';
import type { StateDocumentStore } from './state-document.js';

/**
 * Template Store: named default bundles used to seed new instance configs.
 *
 * Instances copy the template's personality, features and settings when they
 * are created, so editing a template only affects instances created after the
 * edit.
 */
export class TemplateStore {
  constructor(private readonly store: StateDocumentStore) {}

  list(): Template[] {
    return this.store.snapshot().templates;
  }

  find(id: string): Template | undefined {
    return this.list().find((t) => t.templateId === id);
  }

  get(id: string): Template {
    const template = this.find(id);
    if (!template) throw new TemplateNotFoundError(id);
    return template;
  }

  async create(input: TemplateCreateInput): Promise<Template> {
    const now = new Date().toISOString();
    const template: Template = {
      templateId: templateId(input.templateId ?? uuidv4()),
      name: input.name,
      description: input.description ?? '',
      personality: input.personality ?? null,
      features: { ...DEFAULT_FEATURES, ...input.features },
      settings: { ...input.settings },
      createdAt: now,
      updatedAt: now,
    };

    await this.store.update((draft) => {
      if (draft.templates.some((t) => t.templateId === template.templateId)) {
        throw new DuplicateIdError('Template', template.templateId);
      }
      draft.templates.push(template);
    });
    return template;
  }

  async update(id: string, patch: TemplateUpdateInput): Promise<Template> {
    const doc = await this.store.update((draft) => {
      const template = draft.templates.find((t) => t.templateId === id);
      if (!template) throw new TemplateNotFoundError(id);

      if (patch.name !== undefined) template.name = patch.name;
      if (patch.description !== undefined) template.description = patch.description;
      if (patch.personality !== undefined) template.personality = patch.personality;
      if (patch.features) template.features = { ...template.features, ...patch.features };
      if (patch.settings) template.settings = { ...patch.settings };
      template.updatedAt = new Date().toISOString();
    });
    return doc.templates.find((t) => t.templateId === id) ?? this.get(id);
  }

  /** @throws {TemplateInUseError} while any instance config still references it */
  async delete(id: string): Promise<void> {
    await this.store.update((draft) => {
      const index = draft.templates.findIndex((t) => t.templateId === id);
      if (index === -1) throw new TemplateNotFoundError(id);

      const users = draft.instances.filter((i) => i.templateId === id).map((i) => i.instanceId);
      if (users.length > 0) throw new TemplateInUseError(id, users);

      draft.templates.splice(index, 1);
    });
  }
}
