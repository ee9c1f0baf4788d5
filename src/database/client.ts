import { MongoClient, type Db } from 'mongodb';
import type { ZodType } from 'zod';
import { MongoDocumentStore } from './mongo-store.js';
import type { Database, DocumentShape, DocumentStore } from './types.js';

export interface MongoDatabaseOptions {
  uri: string;
  name: string;
  poolSize: number;
  serverSelectionTimeoutMS: number;
}

export class MongoDatabase implements Database {
  private readonly client: MongoClient;
  private readonly db: Db;

  constructor(options: MongoDatabaseOptions) {
    this.client = new MongoClient(options.uri, {
      maxPoolSize: options.poolSize,
      serverSelectionTimeoutMS: options.serverSelectionTimeoutMS,
      // Binary fields come back as Buffers rather than bson Binary.
      promoteBuffers: true,
    });
    this.db = this.client.db(options.name);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  store<T extends DocumentShape>(collection: string, schema: ZodType<T>): DocumentStore<T> {
    return new MongoDocumentStore(this.db.collection(collection), schema);
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Create and connect a MongoDB-backed database. The caller owns the returned
 * instance and must close it.
 */
export async function connectDatabase(options: MongoDatabaseOptions): Promise<MongoDatabase> {
  const database = new MongoDatabase(options);
  await database.connect();
  return database;
}
