import { z } from 'zod';

const TagSchema = z.string().trim().toLowerCase().min(1);

export const SuggestionItemSchema = z
  .object({
    id: z.string().trim().min(1),
    text: z.string().trim().min(1),
    detail: z.string().trim().min(1).optional(),
    polarity: z.enum(['do', 'dont']),
    tags: z.array(TagSchema).optional().default([]),
    priority: z.number().int()
  })
  .strict();

export const CatalogFileSchema = z
  .object({
    version: z.number().int().positive(),
    items: z.array(SuggestionItemSchema)
  })
  .strict();

export type SuggestionItemRecord = z.infer<typeof SuggestionItemSchema>;
