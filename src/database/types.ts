import type { ZodType } from 'zod';

export type DocumentShape = Record<string, unknown>;

/**
 * A persisted document as handed back to callers: the stored fields plus the
 * store-assigned identifier rendered as 24-character hex text.
 */
export type StoredDocument<T extends DocumentShape> = T & { _id: string };

/**
 * One named collection. Identifiers passed in are expected to be well-formed;
 * a malformed one behaves like an unknown one.
 */
export interface DocumentStore<T extends DocumentShape> {
  insert(document: T): Promise<string>;
  list(limit: number): Promise<StoredDocument<T>[]>;
  findById(id: string): Promise<StoredDocument<T> | null>;
  /** Resolves to false when nothing matched. */
  replace(id: string, document: T): Promise<boolean>;
  /** Resolves to false when nothing was deleted. */
  remove(id: string): Promise<boolean>;
  /** Newest document (by `sortField`, then by insertion) whose `field` equals `value`. */
  findLatest(
    field: keyof T & string,
    value: string,
    sortField: keyof T & string
  ): Promise<StoredDocument<T> | null>;
}

export interface Database {
  /** Documents read back are parsed with `schema`; unreadable ones are not returned. */
  store<T extends DocumentShape>(collection: string, schema: ZodType<T>): DocumentStore<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;
