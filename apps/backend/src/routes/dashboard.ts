import type { FastifyInstance } from 'fastify';
import type { Dashboard } from '@sharebox/shared';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { presenterService } from '../services/presenter.service.js';

export async function dashboardRoutes(app: FastifyInstance): Promise<void> {
  const { files: fileService, bundles: bundleService } = app.services;

  // GET /: everything the owner's landing page shows
  app.get('/', { preHandler: [requireAuth] }, async (request, reply) => {
    const ownerId = currentUser(request).id;
    const [fileRows, bundleSummaries, stats] = await Promise.all([
      fileService.listFiles(ownerId),
      bundleService.listBundles(ownerId),
      fileService.getUserStats(ownerId),
    ]);

    const data: Dashboard = {
      files: fileRows.map((row) => presenterService.toFileView(row)),
      bundles: bundleSummaries.map(({ bundle, fileCount }) =>
        presenterService.toBundleView(bundle, fileCount),
      ),
      stats,
    };
    return reply.status(200).send({ data, meta: null, errors: null });
  });
}
