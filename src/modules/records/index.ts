// Services
export { createRecordService, type RecordService } from './records.service.js';

// Schemas & Types
export {
  RecordIdParamSchema,
  LIST_LIMIT,
  type RecordMessages,
  type RecordResource,
  type CreatedResponse,
  type MessageResponse,
} from './records.schema.js';
