import { z } from 'zod';

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const resourceIdSchema = z.string().uuid('Invalid id');

// Multipart form fields arrive as strings; JSON objects are sent encoded.
const jsonObjectField = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON' });
      return z.NEVER;
    }
  })
  .pipe(metadataSchema);

export const createVectorStoreSchema = z.object({
  name: z.string().min(1, 'Vector store name cannot be empty').max(255),
  metadata: metadataSchema.optional(),
});

export const listVectorStoresQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  order: z.enum(['asc', 'desc']).default('desc'),
});

export const chunkingOptionsSchema = z.object({
  chunkSize: z.coerce.number().int().positive().optional(),
  overlap: z.coerce.number().int().min(0).optional(),
});

export const ingestTextSchema = chunkingOptionsSchema.extend({
  text: z.string().min(1, 'Text cannot be empty'),
  filename: z.string().min(1).optional(),
  metadata: metadataSchema.optional(),
  attributes: metadataSchema.optional(),
});

export const uploadFieldsSchema = chunkingOptionsSchema.extend({
  metadata: jsonObjectField.optional(),
  attributes: jsonObjectField.optional(),
});

export const searchRequestSchema = z.object({
  query: z.string().min(1, 'Query cannot be empty'),
  maxResults: z.number().int().min(1).max(100).default(10),
  filter: z.record(z.string()).optional(),
  scoreThreshold: z.number().min(0).max(1).optional(),
});

export type CreateVectorStoreRequest = z.infer<typeof createVectorStoreSchema>;
export type ListVectorStoresQuery = z.infer<typeof listVectorStoresQuerySchema>;
export type UploadFields = z.infer<typeof uploadFieldsSchema>;
export type IngestTextRequest = z.infer<typeof ingestTextSchema>;
export type SearchRequest = z.infer<typeof searchRequestSchema>;
