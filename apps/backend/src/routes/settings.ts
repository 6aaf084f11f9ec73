import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireAuth } from '../middleware/auth.js';
import { parseInput } from '../middleware/validate.js';
import { presenterService } from '../services/presenter.service.js';
import { extractExtension } from '../utils/filename.js';
import { validationError } from '../utils/errors.js';
import { getMimeType } from '../utils/http.js';

const LOGO_FIELD = 'logo';
const CACHE_MAX_AGE = 60 * 60 * 24; // 1 day in seconds

const logoParamsSchema = z.object({
  filename: z.string().min(1).max(255),
});

export async function settingsRoutes(app: FastifyInstance): Promise<void> {
  const settingsService = app.services.settings;

  // GET /logo: current logo name, or null when none was ever set
  app.get('/logo', async (_request, reply) => {
    const row = await settingsService.getCurrentLogo();
    return reply.status(200).send({
      data: row ? presenterService.toLogoSetting(row) : null,
      meta: null,
      errors: null,
    });
  });

  // POST /logo: multipart upload under the "logo" field
  app.post('/logo', { preHandler: [requireAuth] }, async (request, reply) => {
    const part = await request.file();
    if (!part) {
      throw validationError('No logo was selected', LOGO_FIELD);
    }

    const content = await part.toBuffer();
    if (part.fieldname !== LOGO_FIELD) {
      throw validationError('No logo was selected', LOGO_FIELD);
    }

    const row = await settingsService.setLogo(part.filename, content);
    return reply
      .status(201)
      .send({ data: presenterService.toLogoSetting(row), meta: null, errors: null });
  });

  // GET /logo/:filename: stored logo bytes
  app.get('/logo/:filename', async (request, reply) => {
    const { filename } = parseInput(logoParamsSchema, request.params);
    const logo = await settingsService.readLogo(filename);
    return reply
      .header('Content-Type', getMimeType(extractExtension(logo.filename) ?? ''))
      .header('Cache-Control', `public, max-age=${CACHE_MAX_AGE}`)
      .send(logo.content);
  });
}
