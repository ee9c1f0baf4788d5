import { createRecordService, RecordIdParamSchema } from '@modules/records/index.js';
import { attendeesResource } from './attendees.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function attendeesRoutes(app: AppInstance): Promise<void> {
  const service = createRecordService(
    app.db.store(attendeesResource.collection, attendeesResource.schema),
    attendeesResource.messages
  );

  // POST /attendees - Create attendee
  app.post('/', { schema: { body: attendeesResource.schema } }, async (request) => {
    return service.create(request.body);
  });

  // GET /attendees - List attendees (capped)
  app.get('/', async () => {
    return service.list();
  });

  // GET /attendees/:id - Get attendee
  app.get('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.getById(request.params.id);
  });

  // PUT /attendees/:id - Replace attendee
  app.put(
    '/:id',
    { schema: { params: RecordIdParamSchema, body: attendeesResource.schema } },
    async (request) => {
      return service.update(request.params.id, request.body);
    }
  );

  // DELETE /attendees/:id - Delete attendee
  app.delete('/:id', { schema: { params: RecordIdParamSchema } }, async (request) => {
    return service.remove(request.params.id);
  });
}
