import { z } from 'zod';
import type { RecordResource } from '@modules/records/index.js';

export const EventSchema = z.object({
  name: z.string(),
  description: z.string(),
  // Free-form; not parsed as a date
  date: z.string(),
  venue_id: z.string(),
  max_attendees: z.number().int().safe(),
});

export type EventInput = z.infer<typeof EventSchema>;

export const eventsResource: RecordResource<EventInput> = {
  collection: 'events',
  schema: EventSchema,
  messages: {
    created: 'Event created',
    updated: 'Event updated',
    deleted: 'Event deleted',
    notFound: 'Event not found',
  },
};
