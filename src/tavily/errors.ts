import { ServiceError } from '../http/errors';

export class TavilyError extends ServiceError {
  constructor(message: string, status?: number, originalError?: unknown) {
    super(message, 'tavily', status, originalError);
    this.name = 'TavilyError';
  }
}

export class TavilyAuthenticationError extends TavilyError {
  constructor(message = 'Tavily authentication failed') {
    super(message, 401);
    this.name = 'TavilyAuthenticationError';
  }
}

export class TavilyRateLimitError extends TavilyError {
  constructor(
    public retryAfterMs: number | null,
    message: string = 'Tavily rate limit exceeded',
  ) {
    super(message, 429);
    this.name = 'TavilyRateLimitError';
  }
}
