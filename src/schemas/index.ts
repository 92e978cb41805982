import { z } from 'zod';

/**
 * Body of POST /api/extract. Category names are checked against the source
 * catalog by the handler.
 */
export const ExtractRequestSchema = z.object({
  categories: z.array(z.string().trim().min(1)).min(1).optional(),
  force_refresh: z.boolean().default(false),
});

export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;

/**
 * Query of GET /api/highlights
 */
export const HighlightsQuerySchema = z.object({
  category: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type HighlightsQuery = z.infer<typeof HighlightsQuerySchema>;

export const ArticlesQuerySchema = z.object({
  category: z.string().trim().min(1).optional(),
});

export type ArticlesQuery = z.infer<typeof ArticlesQuerySchema>;

/**
 * Body of POST /api/chat. Length and content checks happen in the chat service.
 */
export const ChatRequestSchema = z.object({
  message: z.unknown(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
