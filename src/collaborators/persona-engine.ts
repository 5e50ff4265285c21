import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../common/errors/index.js';
import type {
  BehaviorDescriptor,
  InstanceIdentity,
  PersonalityEngine,
} from '../common/types/collaborators.js';
import type { FeatureFlags } from '../common/types/template.js';

const PERSONAS_FILE = new URL('../../data/personas.json', import.meta.url);

/** Used when neither the template nor the instance names a personality. */
export const DEFAULT_PERSONA = 'adaptive';

const personaSchema = z.object({
  personaId: z.string().min(1),
  displayName: z.string().min(1),
  traits: z.array(z.string()),
  evolving: z.boolean(),
});

export type Persona = z.infer<typeof personaSchema>;

export async function loadPersonas(file: URL | string = PERSONAS_FILE): Promise<Persona[]> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
  return z.array(personaSchema).parse(raw);
}

/** Maps a personality name onto one of the catalog personas. */
export class PersonaCatalogEngine implements PersonalityEngine {
  private readonly personas: Map<string, Persona>;

  constructor(personas: Persona[]) {
    this.personas = new Map(personas.map((p) => [p.personaId, p]));
  }

  static async fromFile(file?: URL | string): Promise<PersonaCatalogEngine> {
    return new PersonaCatalogEngine(await loadPersonas(file));
  }

  async describe(
    identity: InstanceIdentity,
    profile: { personality: string | null; features: FeatureFlags; settings: Record<string, string> },
  ): Promise<BehaviorDescriptor> {
    const personaId = profile.personality ?? DEFAULT_PERSONA;
    const persona = this.personas.get(personaId);
    if (!persona) {
      throw new ConfigError(`Unknown personality "${personaId}" for instance ${identity.instanceId}`);
    }
    return {
      personaId: persona.personaId,
      displayName: identity.name || persona.displayName,
      traits: [...persona.traits],
      evolving: persona.evolving,
      features: { ...profile.features },
      settings: { ...profile.settings },
    };
  }
}
