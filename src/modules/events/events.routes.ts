import { createRecordService, RecordIdParamSchema } from '@modules/records/index.js';
import { eventsResource } from './events.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function eventsRoutes(app: AppInstance): Promise<void> {
  const service = createRecordService(
    app.db.store(eventsResource.collection, eventsResource.schema),
    eventsResource.messages
  );

  // POST /events - Create event
  app.post('/', { schema: { body: eventsResource.schema } }, async (request) => {
    return service.create(request.body);
  });

  // GET /events - List events (capped)
  app.get('/', async () => {
    return service.list();
  });

  // GET /events/:id - Get event
  app.get('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.getById(request.params.id);
  });

  // PUT /events/:id - Replace event
  app.put(
    '/:id',
    { schema: { params: RecordIdParamSchema, body: eventsResource.schema } },
    async (request) => {
      return service.update(request.params.id, request.body);
    }
  );

  // DELETE /events/:id - Delete event
  app.delete('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.remove(request.params.id);
  });
}
