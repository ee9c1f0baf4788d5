import { z } from 'zod';
import type { RecordResource } from '@modules/records/index.js';

export const AttendeeSchema = z.object({
  name: z.string(),
  email: z.string(),
  phone: z.string().nullish(),
});

export type AttendeeInput = z.infer<typeof AttendeeSchema>;

export const attendeesResource: RecordResource<AttendeeInput> = {
  collection: 'attendees',
  schema: AttendeeSchema,
  messages: {
    created: 'Attendee created',
    updated: 'Attendee updated',
    deleted: 'Attendee deleted',
    notFound: 'Attendee not found',
  },
};
