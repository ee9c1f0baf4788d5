import { z } from 'zod';
import type { RecordResource } from '@modules/records/index.js';

// event_id and attendee_id are stored as given; they are never looked up.
export const BookingSchema = z.object({
  event_id: z.string(),
  attendee_id: z.string(),
  ticket_type: z.string(),
  quantity: z.number().int().safe(),
});

export type BookingInput = z.infer<typeof BookingSchema>;

export const bookingsResource: RecordResource<BookingInput> = {
  collection: 'bookings',
  schema: BookingSchema,
  messages: {
    created: 'Booking successful',
    updated: 'Booking updated',
    deleted: 'Booking deleted',
    notFound: 'Booking not found',
  },
};
