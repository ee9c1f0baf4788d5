import { z } from 'zod';
import type { RecordResource } from '@modules/records/index.js';

export const VenueSchema = z.object({
  name: z.string(),
  address: z.string(),
  capacity: z.number().int().safe(),
});

export type VenueInput = z.infer<typeof VenueSchema>;

export const venuesResource: RecordResource<VenueInput> = {
  collection: 'venues',
  schema: VenueSchema,
  messages: {
    created: 'Venue created',
    updated: 'Venue updated',
    deleted: 'Venue deleted',
    notFound: 'Venue not found',
  },
};
