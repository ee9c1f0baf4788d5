// Services
export { createMediaService, type MediaService, type UploadedFile } from './media.service.js';

// Schemas & Types
export {
  MediaDocumentSchema,
  OwnerParamSchema,
  mediaVariants,
  eventPosterVariant,
  promoVideoVariant,
  venuePhotoVariant,
  type MediaDocument,
  type MediaVariant,
  type OwnerField,
} from './media.schema.js';

// Routes
export { mediaRoutes } from './media.routes.js';
