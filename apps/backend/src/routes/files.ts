import type { FastifyInstance } from 'fastify';
import { entityIdParamsSchema, renameFileSchema, uploadFieldsSchema } from '@sharebox/shared';
import type { VisibilityResult } from '@sharebox/shared';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { parseInput } from '../middleware/validate.js';
import { presenterService } from '../services/presenter.service.js';
import { validationError } from '../utils/errors.js';
import { multipartField } from '../utils/http.js';

const UPLOAD_FIELD = 'file';

export async function fileRoutes(app: FastifyInstance): Promise<void> {
  const fileService = app.services.files;

  app.addHook('preHandler', requireAuth);

  // GET /: the caller's files, newest first
  app.get('/', async (request, reply) => {
    const rows = await fileService.listFiles(currentUser(request).id);
    return reply.status(200).send({
      data: rows.map((row) => presenterService.toFileView(row)),
      meta: { total: rows.length },
      errors: null,
    });
  });

  // POST /: multipart upload. Text fields must precede the file part.
  app.post('/', async (request, reply) => {
    const part = await request.file();
    if (!part) {
      throw validationError('No file was selected', UPLOAD_FIELD);
    }

    // Drain the part before anything else can throw; size limits apply here
    const content = await part.toBuffer();
    if (part.fieldname !== UPLOAD_FIELD) {
      throw validationError('No file was selected', UPLOAD_FIELD);
    }

    const fields = parseInput(uploadFieldsSchema, {
      transactionNumber: multipartField(part.fields, 'transactionNumber'),
      isPublic: multipartField(part.fields, 'isPublic'),
    });
    const row = await fileService.uploadFile(currentUser(request).id, {
      filename: part.filename,
      content,
      isPublic: fields.isPublic,
      transactionNumber: fields.transactionNumber,
    });

    return reply
      .status(201)
      .send({ data: presenterService.toFileView(row), meta: null, errors: null });
  });

  // PATCH /:id: rename
  app.patch('/:id', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    const { name } = parseInput(renameFileSchema, request.body);
    const row = await fileService.renameFile(currentUser(request), id, name);
    return reply
      .status(200)
      .send({ data: presenterService.toFileView(row), meta: null, errors: null });
  });

  // POST /:id/visibility: toggle public/private
  app.post('/:id/visibility', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    const row = await fileService.toggleVisibility(currentUser(request), id);
    const data: VisibilityResult = {
      id: row.id,
      visibility: presenterService.toFileView(row).visibility,
    };
    return reply.status(200).send({ data, meta: null, errors: null });
  });

  // DELETE /:id
  app.delete('/:id', async (request, reply) => {
    const { id } = parseInput(entityIdParamsSchema, request.params);
    await fileService.deleteFile(currentUser(request), id);
    return reply.status(200).send({ data: null, meta: null, errors: null });
  });
}
