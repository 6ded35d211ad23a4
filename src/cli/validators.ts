import type { SearchDepth } from '../config/validator';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const DEFAULT_QUERY = 'What are the impacts of AI on the world';

/** Join the positional words into one query; no words means the default query */
export function parseQuery(words: string[] | string | undefined): string {
  const joined = (Array.isArray(words) ? words.join(' ') : (words ?? '')).trim();
  return joined.length > 0 ? joined : DEFAULT_QUERY;
}

export function parseMaxResults(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 20) {
    throw new ValidationError(`--max-results must be an integer between 1 and 20, got "${raw}"`);
  }
  return value;
}

export function parseSearchDepth(raw: string): SearchDepth {
  if (raw === 'basic' || raw === 'advanced') return raw;
  throw new ValidationError(`--search-depth must be "basic" or "advanced", got "${raw}"`);
}
