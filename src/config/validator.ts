import { z } from 'zod';

export const SearchDepthSchema = z.enum(['basic', 'advanced']);

export const ConfigSchema = z.object({
  tavily: z.object({
    api_key: z.string().min(1, 'Tavily API key is required'),
    max_results: z.coerce.number().int().min(1).max(20),
    search_depth: SearchDepthSchema,
    timeout_ms: z.coerce.number().int().positive(),
  }),
  groq: z.object({
    api_key: z.string().min(1, 'Groq API key is required'),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2),
    timeout_ms: z.coerce.number().int().positive(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SearchDepth = z.infer<typeof SearchDepthSchema>;

export class ConfigValidationError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/** Flatten zod issues into `path: message` lines */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
