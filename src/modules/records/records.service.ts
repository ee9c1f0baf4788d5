import { notFound } from '@shared/errors/app-error.js';
import type { DocumentShape, DocumentStore, StoredDocument } from '@/database/types.js';
import {
  LIST_LIMIT,
  type CreatedResponse,
  type MessageResponse,
  type RecordMessages,
} from './records.schema.js';

export interface RecordService<T extends DocumentShape> {
  create(input: T): Promise<CreatedResponse>;
  list(): Promise<StoredDocument<T>[]>;
  getById(id: string): Promise<StoredDocument<T>>;
  update(id: string, input: T): Promise<MessageResponse>;
  remove(id: string): Promise<MessageResponse>;
}

export function createRecordService<T extends DocumentShape>(
  store: DocumentStore<T>,
  messages: RecordMessages
): RecordService<T> {
  return {
    async create(input) {
      const id = await store.insert(input);
      return { message: messages.created, id };
    },

    async list() {
      return store.list(LIST_LIMIT);
    },

    async getById(id) {
      const document = await store.findById(id);
      if (!document) {
        throw notFound(messages.notFound);
      }
      return document;
    },

    /**
     * Replaces every field of the record.
     */
    async update(id, input) {
      const matched = await store.replace(id, input);
      if (!matched) {
        throw notFound(messages.notFound);
      }
      return { message: messages.updated };
    },

    async remove(id) {
      const deleted = await store.remove(id);
      if (!deleted) {
        throw notFound(messages.notFound);
      }
      return { message: messages.deleted };
    },
  };
}
