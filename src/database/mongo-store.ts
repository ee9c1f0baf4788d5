import { ObjectId, type Collection, type Document, type WithId } from 'mongodb';
import type { ZodType } from 'zod';
import { logger } from '@shared/utils/logger.js';
import type { DocumentShape, DocumentStore, StoredDocument } from './types.js';

export class MongoDocumentStore<T extends DocumentShape> implements DocumentStore<T> {
  constructor(
    private readonly collection: Collection<Document>,
    private readonly schema: ZodType<T>
  ) {}

  async insert(document: T): Promise<string> {
    const payload: Document = { ...document };
    const result = await this.collection.insertOne(payload);
    return String(result.insertedId);
  }

  async list(limit: number): Promise<StoredDocument<T>[]> {
    const documents = await this.collection.find({}, { limit }).toArray();
    const stored: StoredDocument<T>[] = [];

    for (const document of documents) {
      const parsed = this.read(document);
      if (parsed) stored.push(parsed);
    }
    return stored;
  }

  async findById(id: string): Promise<StoredDocument<T> | null> {
    if (!ObjectId.isValid(id)) return null;

    const document = await this.collection.findOne({ _id: new ObjectId(id) });
    return document ? this.read(document) : null;
  }

  async replace(id: string, document: T): Promise<boolean> {
    if (!ObjectId.isValid(id)) return false;

    const replacement: Document = { ...document };
    const result = await this.collection.replaceOne({ _id: new ObjectId(id) }, replacement);
    return result.matchedCount > 0;
  }

  async remove(id: string): Promise<boolean> {
    if (!ObjectId.isValid(id)) return false;

    const result = await this.collection.deleteOne({ _id: new ObjectId(id) });
    return result.deletedCount > 0;
  }

  async findLatest(
    field: keyof T & string,
    value: string,
    sortField: keyof T & string
  ): Promise<StoredDocument<T> | null> {
    const document = await this.collection.findOne(
      { [field]: value },
      { sort: { [sortField]: -1, _id: -1 } }
    );
    return document ? this.read(document) : null;
  }

  /**
   * Documents that no longer match the schema are logged and treated as
   * absent, so they never reach a response.
   */
  private read(document: WithId<Document>): StoredDocument<T> | null {
    const { _id, ...fields } = document;
    const result = this.schema.safeParse(fields);
    if (!result.success) {
      logger.warn(
        { collection: this.collection.collectionName, id: String(_id) },
        'Skipping document that does not match its schema'
      );
      return null;
    }
    return { ...result.data, _id: String(_id) };
  }
}
