import { createRecordService, RecordIdParamSchema } from '@modules/records/index.js';
import { venuesResource } from './venues.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function venuesRoutes(app: AppInstance): Promise<void> {
  const service = createRecordService(
    app.db.store(venuesResource.collection, venuesResource.schema),
    venuesResource.messages
  );

  // POST /venues - Create venue
  app.post('/', { schema: { body: venuesResource.schema } }, async (request) => {
    return service.create(request.body);
  });

  // GET /venues - List venues (capped)
  app.get('/', async () => {
    return service.list();
  });

  // GET /venues/:id - Get venue
  app.get('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.getById(request.params.id);
  });

  // PUT /venues/:id - Replace venue
  app.put(
    '/:id',
    { schema: { params: RecordIdParamSchema, body: venuesResource.schema } },
    async (request) => {
      return service.update(request.params.id, request.body);
    }
  );

  // DELETE /venues/:id - Delete venue
  app.delete('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.remove(request.params.id);
  });
}
