import type { FastifyInstance } from 'fastify';
import { createBundleSchema, entityIdParamsSchema, updateBundleSchema } from '@sharebox/shared';
import type { VisibilityResult } from '@sharebox/shared';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { parseInput } from '../middleware/validate.js';
import { presenterService } from '../services/presenter.service.js';

export async function bundleRoutes(app: FastifyInstance): Promise<void> {
  const bundleService = app.services.bundles;

  app.addHook('preHandler', requireAuth);

  // GET /
  app.get('/', async (request, reply) => {
    const summaries = await bundleService.listBundles(currentUser(request).id);
    return reply.status(200).send({
      data: summaries.map(({ bundle, fileCount }) =>
        presenterService.toBundleView(bundle, fileCount),
      ),
      meta: { total: summaries.length },
      errors: null,
    });
  });

  // POST /
  app.post('/', async (request, reply) => {
    const body = parseInput(createBundleSchema, request.body);
    const { bundle, files } = await bundleService.createBundle(currentUser(request), body);
    return reply.status(201).send({
      data: presenterService.toBundleDetail(bundle, files),
      meta: null,
      errors: null,
    });
  });

  // GET /:id: owner view, including member files for editing
  app.get('/:id', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    const { bundle, files } = await bundleService.getOwnedBundle(currentUser(request), id);
    return reply.status(200).send({
      data: presenterService.toBundleDetail(bundle, files),
      meta: null,
      errors: null,
    });
  });

  // PUT /:id: full replace of the bundle fields and its members
  app.put('/:id', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    const body = parseInput(updateBundleSchema, request.body);
    const { bundle, files } = await bundleService.updateBundle(currentUser(request), id, body);
    return reply.status(200).send({
      data: presenterService.toBundleDetail(bundle, files),
      meta: null,
      errors: null,
    });
  });

  // POST /:id/visibility
  app.post('/:id/visibility', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    const row = await bundleService.toggleVisibility(currentUser(request), id);
    const data: VisibilityResult = {
      id: row.id,
      visibility: row.isPublic ? 'public' : 'private',
    };
    return reply.status(200).send({ data, meta: null, errors: null });
  });

  // DELETE /:id: member files are kept
  app.delete('/:id', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    await bundleService.deleteBundle(currentUser(request), id);
    return reply.status(200).send({ data: null, meta: null, errors: null });
  });
}
