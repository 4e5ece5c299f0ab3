import { z } from 'zod';
import { authConfigSchema } from './auth.schema.js';

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
  host: z.string().default('127.0.0.1'),
});

export const databaseConfigSchema = z.object({
  path: z.string().min(1).default('.tally/tally.db'),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const tallyConfigSchema = z.object({
  server: serverConfigSchema.default({}),
  auth: authConfigSchema,
  database: databaseConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
