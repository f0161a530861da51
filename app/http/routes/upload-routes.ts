import { Router } from 'express';
import z from 'zod/v3';

import { ValidationError } from '@app/errors.js';
import { parseRequest } from '@app/http/request-parsing.js';
import type { UploadService } from '@app/services/upload-service.js';

export const UPLOAD_BODY_LIMIT = '25mb';

const UploadQuerySchema = z.object({ filename: z.string() });
const PresignQuerySchema = z.object({
  filename: z.string(),
  contentType: z.string().optional(),
});

/**
 * Expects the raw body parser to be mounted in front of it, so the request body is the file
 * content whatever its media type.
 */
export function createUploadRouter(uploads: UploadService): Router {
  const router = Router();

  router.post('/', async function (req, res) {
    const { filename } = parseRequest(UploadQuerySchema, req.query, 'query parameters');
    const content: unknown = req.body;
    if (!(content instanceof Uint8Array)) {
      throw new ValidationError('Request body must be the raw file content');
    }
    const stored = await uploads.uploadFile({
      filename,
      content,
      contentType: req.get('content-type'),
    });
    res.status(201).json(stored);
  });

  router.get('/presigned', async function (req, res) {
    const input = parseRequest(PresignQuerySchema, req.query, 'query parameters');
    res.json(await uploads.getPresignedUploadUrl(input));
  });

  return router;
}
