import { notFound } from '@shared/errors/app-error.js';
import type { DocumentStore, StoredDocument } from '@/database/types.js';
import type { CreatedResponse } from '@modules/records/index.js';
import type { MediaDocument, MediaVariant, OwnerField } from './media.schema.js';

export interface UploadedFile {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface MediaService {
  upload(ownerId: string, file: UploadedFile): Promise<CreatedResponse>;
  /** Latest attachment for the owner. */
  download(ownerId: string): Promise<StoredDocument<MediaDocument>>;
}

function ownerFields(field: OwnerField, ownerId: string): Pick<MediaDocument, OwnerField> {
  return field === 'event_id' ? { event_id: ownerId } : { venue_id: ownerId };
}

export function createMediaService(
  store: DocumentStore<MediaDocument>,
  variant: MediaVariant
): MediaService {
  return {
    async upload(ownerId, file) {
      const id = await store.insert({
        ...ownerFields(variant.ownerField, ownerId),
        filename: file.filename,
        content_type: file.contentType,
        content: file.content,
        uploaded_at: new Date(),
      });
      return { message: variant.messages.uploaded, id };
    },

    async download(ownerId) {
      const attachment = await store.findLatest(variant.ownerField, ownerId, 'uploaded_at');
      if (!attachment) {
        throw notFound(variant.messages.notFound);
      }
      return attachment;
    },
  };
}
