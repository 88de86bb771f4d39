import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

export const exportFormatSchema = z.enum(['schem', 'mcfunction']);

export const promptImageSchema = z.object({
  data: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9+/]+={0,2}$/, 'must be base64'),
  mediaType: z.enum(['image/png', 'image/jpeg', 'image/gif', 'image/webp']),
});

export const generateBodySchema = z.object({
  description: z.string().trim().min(1),
  version: z.string().min(1).optional(),
  format: exportFormatSchema.default('schem'),
  image: promptImageSchema.optional(),
});

export const blocksQuerySchema = z.object({
  version: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
});

export const eventsQuerySchema = z.object({
  sinceSeq: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  types: z
    .string()
    .min(1)
    .transform(v => v.split(',').map(t => t.trim()).filter(Boolean))
    .optional(),
});

export const fileParamsSchema = z.object({
  fileName: z.string().min(1),
});

export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidArgumentError(message);
  }
  return parsed.data;
}
