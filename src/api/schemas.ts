import { z } from 'zod';
import { ValidationError } from '../common/errors/index.js';
import { idSchema } from '../store/state-document.js';

const name = z.string().trim().min(1).max(100);
const settings = z.record(z.string(), z.string());
const features = z
  .object({
    semanticSearch: z.boolean(),
    webSearch: z.boolean(),
    localModel: z.boolean(),
  })
  .partial()
  .strict();

export const instanceCreateSchema = z
  .object({
    instanceId: idSchema.optional(),
    name,
    templateId: idSchema,
    credentialId: idSchema,
    personalityOverride: z.string().min(1).nullable().optional(),
    autoStart: z.boolean().optional(),
    settings: settings.optional(),
  })
  .strict();

export const instanceUpdateSchema = z
  .object({
    name: name.optional(),
    credentialId: idSchema.optional(),
    personalityOverride: z.string().min(1).nullable().optional(),
    features: features.optional(),
    settings: settings.optional(),
    autoStart: z.boolean().optional(),
  })
  .strict();

export const templateCreateSchema = z
  .object({
    templateId: idSchema.optional(),
    name,
    description: z.string().max(500).optional(),
    personality: z.string().min(1).nullable().optional(),
    features: features.optional(),
    settings: settings.optional(),
  })
  .strict();

export const templateUpdateSchema = templateCreateSchema.omit({ templateId: true });

export const credentialCreateSchema = z
  .object({
    credentialId: idSchema.optional(),
    name,
    secret: z.string().min(1),
  })
  .strict();

/** Parse a request body, turning zod issues into a 400. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(body)',
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid request body: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}
