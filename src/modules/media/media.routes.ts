import { createMediaService } from './media.service.js';
import { MediaDocumentSchema, OwnerParamSchema, mediaVariants } from './media.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function mediaRoutes(app: AppInstance): Promise<void> {
  for (const variant of mediaVariants) {
    const service = createMediaService(
      app.db.store(variant.collection, MediaDocumentSchema),
      variant
    );

    // POST /upload_*/:owner_id - Store the first file part of a multipart body
    app.post(
      `${variant.uploadPath}/:owner_id`,
      { schema: { params: OwnerParamSchema } },
      async (request) => {
        const file = await request.file();
        if (!file) {
          throw app.httpErrors.badRequest('File is required');
        }

        const content = await file.toBuffer();
        return service.upload(request.params.owner_id, {
          filename: file.filename,
          contentType: file.mimetype,
          content,
        });
      }
    );

    // GET /get_*/:owner_id - Raw bytes with the declared content type
    app.get(
      `${variant.downloadPath}/:owner_id`,
      { schema: { params: OwnerParamSchema } },
      async (request, reply) => {
        const attachment = await service.download(request.params.owner_id);
        return reply.type(attachment.content_type).send(attachment.content);
      }
    );
  }
}
