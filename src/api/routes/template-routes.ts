import type { FastifyInstance } from 'fastify';
import type { StatusBus } from '../../status/status-bus.js';
import type { TemplateStore } from '../../store/template-store.js';
import { parseBody, templateCreateSchema, templateUpdateSchema } from '../schemas.js';

interface TemplateParams {
  templateId: string;
}

/**
 * Template routes. Edits only affect instances created afterwards; existing
 * instances keep the seed they were created with.
 */
export async function templateRoutes(
  app: FastifyInstance,
  opts: { templates: TemplateStore; bus: StatusBus },
): Promise<void> {
  const { templates, bus } = opts;
  const announce = (action: 'created' | 'updated' | 'deleted', id: string) => {
    bus.publish({ type: 'config', entity: 'template', action, id, timestamp: new Date().toISOString() });
  };

  app.get('/api/templates', async () => {
    return { templates: templates.list() };
  });

  app.get<{ Params: TemplateParams }>('/api/templates/:templateId', async (request) => {
    return { template: templates.get(request.params.templateId) };
  });

  app.post('/api/templates', async (request, reply) => {
    const template = await templates.create(parseBody(templateCreateSchema, request.body));
    announce('created', template.templateId);
    reply.code(201);
    return { template };
  });

  app.patch<{ Params: TemplateParams }>('/api/templates/:templateId', async (request) => {
    const template = await templates.update(request.params.templateId, parseBody(templateUpdateSchema, request.body));
    announce('updated', template.templateId);
    return { template };
  });

  // 409 while any instance still references it
  app.delete<{ Params: TemplateParams }>('/api/templates/:templateId', async (request, reply) => {
    await templates.delete(request.params.templateId);
    announce('deleted', request.params.templateId);
    reply.code(204);
  });
}
