import type { InstanceConfig } from '../common/types/instance.js';
import type { FeatureFlags, Template } from '../common/types/template.js';

/** What a worker is started with: the instance's seed with its overrides applied. */
export interface ResolvedProfile {
  personality: string | null;
  features: FeatureFlags;
  settings: Record<string, string>;
}

/** Copy a template's defaults into a new instance, letting per-instance settings win. */
export function seedFromTemplate(
  template: Template,
  settings: Record<string, string> = {},
): Pick<InstanceConfig, 'personality' | 'features' | 'settings'> {
  return {
    personality: template.personality,
    features: { ...template.features },
    settings: { ...template.settings, ...settings },
  };
}

export function resolveProfile(config: InstanceConfig): ResolvedProfile {
  return {
    personality: config.personalityOverride ?? config.personality,
    features: { ...config.features },
    settings: { ...config.settings },
  };
}

export function sameProfile(a: ResolvedProfile, b: ResolvedProfile): boolean {
  return (
    a.personality === b.personality &&
    a.features.semanticSearch === b.features.semanticSearch &&
    a.features.webSearch === b.features.webSearch &&
    a.features.localModel === b.features.localModel &&
    sameRecord(a.settings, b.settings)
  );
}

function sameRecord(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}
