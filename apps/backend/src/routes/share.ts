import type { FastifyInstance } from 'fastify';
import { sharedFileQuerySchema, shareTokenParamsSchema } from '@sharebox/shared';
import type { SharedFileView } from '@sharebox/shared';
import { optionalAuth } from '../middleware/auth.js';
import { parseInput } from '../middleware/validate.js';
import { presenterService } from '../services/presenter.service.js';
import { contentDisposition, getMimeType, isInlineViewable } from '../utils/http.js';

/**
 * Token-keyed access. Anonymous callers are allowed; whether the token
 * resolves for them is decided by the item's visibility and ownership.
 */
export async function shareRoutes(app: FastifyInstance): Promise<void> {
  const { files: fileService, bundles: bundleService } = app.services;

  app.addHook('preHandler', optionalAuth);

  // GET /files/:token: metadata, plus bundle context when opened via ?bundle=
  app.get('/files/:token', async (request, reply) => {
    const { token } = parseInput(shareTokenParamsSchema, request.params);
    const { bundle: bundleToken } = parseInput(sharedFileQuerySchema, request.query);

    const shared = await fileService.getSharedFile(request.user, token, bundleToken);
    const data: SharedFileView = {
      file: presenterService.toFileView(shared.file),
      bundle: shared.bundle ? presenterService.toBundleContext(shared.bundle) : null,
    };
    return reply.status(200).send({ data, meta: null, errors: null });
  });

  // GET /files/:token/view: inline content for images and pdf
  app.get('/files/:token/view', async (request, reply) => {
    const { token } = parseInput(shareTokenParamsSchema, request.params);

    const shared = await fileService.getSharedFile(request.user, token);
    if (!isInlineViewable(shared.file.fileType)) {
      // Resolves against /files/:token/view
      return reply.redirect('download');
    }

    const { file, content } = await fileService.viewFile(request.user, token);
    return reply
      .header('Content-Type', getMimeType(file.fileType))
      .header('Content-Disposition', contentDisposition('inline', file.originalFilename))
      .header('Cache-Control', 'private, no-cache')
      .send(content);
  });

  // GET /files/:token/download: attachment; counts as a download
  app.get('/files/:token/download', async (request, reply) => {
    const { token } = parseInput(shareTokenParamsSchema, request.params);
    const { file, content } = await fileService.downloadFile(request.user, token);
    return reply
      .header('Content-Type', getMimeType(file.fileType))
      .header('Content-Disposition', contentDisposition('attachment', file.originalFilename))
      .header('Cache-Control', 'private, no-cache')
      .send(content);
  });

  // GET /bundles/:token: bundle and its member files
  app.get('/bundles/:token', async (request, reply) => {
    const { token } = parseInput(shareTokenParamsSchema, request.params);
    const { bundle, files } = await bundleService.getSharedBundle(request.user, token);
    return reply.status(200).send({
      data: presenterService.toBundleDetail(bundle, files),
      meta: null,
      errors: null,
    });
  });

  // GET /bundles/:token/download: zip of every member; counts as a download
  app.get('/bundles/:token/download', async (request, reply) => {
    const { token } = parseInput(shareTokenParamsSchema, request.params);
    const archive = await bundleService.downloadBundle(request.user, token);
    return reply
      .header('Content-Type', 'application/zip')
      .header('Content-Disposition', contentDisposition('attachment', archive.filename))
      .header('Cache-Control', 'private, no-cache')
      .send(archive.content);
  });
}
