import { z, type ZodType } from 'zod';
import { OBJECT_ID_PATTERN, type DocumentShape } from '@/database/types.js';

// ============================================================================
// Request Schemas
// ============================================================================

export const RecordIdParamSchema = z.object({
  id: z.string().regex(OBJECT_ID_PATTERN, 'Must be a 24-character hex identifier'),
});

// ============================================================================
// Resource Definition
// ============================================================================

export interface RecordMessages {
  created: string;
  updated: string;
  deleted: string;
  notFound: string;
}

/**
 * Everything that distinguishes one CRUD resource from another.
 */
export interface RecordResource<T extends DocumentShape> {
  collection: string;
  schema: ZodType<T>;
  messages: RecordMessages;
}

export const LIST_LIMIT = 100;

// ============================================================================
// Response Types
// ============================================================================

export interface CreatedResponse {
  message: string;
  id: string;
}

export interface MessageResponse {
  message: string;
}
