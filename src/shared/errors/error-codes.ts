export const ErrorCodes = {
  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_2001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_3001',
  BAD_REQUEST: 'RES_3003',
  INVALID_ID: 'RES_3004',

  // Rate Limit (4xxx)
  RATE_LIMITED: 'RATE_4001',

  // Server (5xxx)
  INTERNAL_ERROR: 'SRV_5001',
  DATABASE_ERROR: 'SRV_5002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
