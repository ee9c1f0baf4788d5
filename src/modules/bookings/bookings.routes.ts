import { createRecordService, RecordIdParamSchema } from '@modules/records/index.js';
import { bookingsResource } from './bookings.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function bookingsRoutes(app: AppInstance): Promise<void> {
  const service = createRecordService(
    app.db.store(bookingsResource.collection, bookingsResource.schema),
    bookingsResource.messages
  );

  // POST /bookings - Create booking
  app.post('/', { schema: { body: bookingsResource.schema } }, async (request) => {
    return service.create(request.body);
  });

  // GET /bookings - List bookings (capped)
  app.get('/', async () => {
    return service.list();
  });

  // GET /bookings/:id - Get booking
  app.get('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.getById(request.params.id);
  });

  // PUT /bookings/:id - Replace booking
  app.put(
    '/:id',
    { schema: { params: RecordIdParamSchema, body: bookingsResource.schema } },
    async (request) => {
      return service.update(request.params.id, request.body);
    }
  );

  // DELETE /bookings/:id - Delete booking
  app.delete('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.remove(request.params.id);
  });
}
