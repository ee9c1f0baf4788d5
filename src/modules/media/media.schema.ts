import { z } from 'zod';

// ============================================================================
// Stored Document
// ============================================================================

/**
 * Posters and promo videos are owned by an event (`event_id`), photos by a
 * venue (`venue_id`). The owner id is stored as given and never looked up.
 */
export const MediaDocumentSchema = z.object({
  event_id: z.string().optional(),
  venue_id: z.string().optional(),
  filename: z.string(),
  content_type: z.string(),
  content: z.instanceof(Buffer),
  uploaded_at: z.date(),
});

export type MediaDocument = z.infer<typeof MediaDocumentSchema>;

export type OwnerField = 'event_id' | 'venue_id';

// ============================================================================
// Request Schemas
// ============================================================================

export const OwnerParamSchema = z.object({
  owner_id: z.string(),
});

// ============================================================================
// Variants
// ============================================================================

export interface MediaVariant {
  collection: string;
  ownerField: OwnerField;
  uploadPath: string;
  downloadPath: string;
  messages: {
    uploaded: string;
    notFound: string;
  };
}

export const eventPosterVariant: MediaVariant = {
  collection: 'event_posters',
  ownerField: 'event_id',
  uploadPath: '/upload_event_poster',
  downloadPath: '/get_poster',
  messages: {
    uploaded: 'Event poster uploaded',
    notFound: 'File not found',
  },
};

export const promoVideoVariant: MediaVariant = {
  collection: 'promo_videos',
  ownerField: 'event_id',
  uploadPath: '/upload_promo_video',
  downloadPath: '/get_promo_video',
  messages: {
    uploaded: 'Promotional video uploaded',
    notFound: 'Promotional video not found',
  },
};

export const venuePhotoVariant: MediaVariant = {
  collection: 'venue_photos',
  ownerField: 'venue_id',
  uploadPath: '/upload_venue_photo',
  downloadPath: '/get_venue_photo',
  messages: {
    uploaded: 'Venue photo uploaded',
    notFound: 'Venue photo not found',
  },
};

export const mediaVariants: readonly MediaVariant[] = [
  eventPosterVariant,
  promoVideoVariant,
  venuePhotoVariant,
];
