import type { TemplateId } from './ids.js';

export interface FeatureFlags {
  /** Open the knowledge store with semantic search enabled. */
  semanticSearch: boolean;
  webSearch: boolean;
  /** Prefer a locally hosted model over the hosted provider. */
  localModel: boolean;
}

export interface Template {
  templateId: TemplateId;
  name: string;
  description: string;
  personality: string | null;
  features: FeatureFlags;
  settings: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

export interface TemplateCreateInput {
  templateId?: string;
  name: string;
  description?: string;
  personality?: string | null;
  features?: Partial<FeatureFlags>;
  settings?: Record<string, string>;
}

export type TemplateUpdateInput = Partial<Omit<TemplateCreateInput, 'templateId'>>;

export const DEFAULT_FEATURES: FeatureFlags = {
  semanticSearch: true,
  webSearch: false,
  localModel: false,
};
