import { z } from 'zod';
import { boundedText } from './text.schema.js';

export const authConfigSchema = z.object({
  jwtSecret: z
    .string({ required_error: 'a signing secret is required (set TALLY_JWT_SECRET)' })
    .min(16),
  accessTokenExpireMinutes: z.number().int().min(1).default(30),
});

export const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int().optional(),
  exp: z.number().int(),
});

export const registerRequestSchema = z.object({
  username: boundedText(3, 50),
  password: z.string().min(1),
});

export const loginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});
