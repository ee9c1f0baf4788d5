import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  MONGO_URI: z
    .string()
    .regex(/^mongodb(\+srv)?:\/\//, 'MONGO_URI must be a mongodb:// or mongodb+srv:// connection string'),
  MONGO_DB_NAME: z.string().min(1).default('event_management_db'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  ...env,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  database: {
    uri: env.MONGO_URI,
    name: env.MONGO_DB_NAME,
    poolSize: env.NODE_ENV === 'production' ? 20 : 5,
    serverSelectionTimeoutMS: 5000,
  },
  security: {
    rateLimit: {
      max: env.NODE_ENV === 'production' ? 100 : 1000,
      timeWindow: '1 minute',
    },
  },
};
