import { ServiceError } from '../http/errors';

export class GroqError extends ServiceError {
  constructor(message: string, status?: number, originalError?: unknown) {
    super(message, 'groq', status, originalError);
    this.name = 'GroqError';
  }
}

export class GroqAuthenticationError extends GroqError {
  constructor(message = 'Groq authentication failed') {
    super(message, 401);
    this.name = 'GroqAuthenticationError';
  }
}

export class GroqRateLimitError extends GroqError {
  constructor(
    public retryAfterMs: number | null,
    message: string = 'Groq rate limit exceeded',
  ) {
    super(message, 429);
    this.name = 'GroqRateLimitError';
  }
}

export class GroqModelNotFoundError extends GroqError {
  constructor(model: string) {
    super(`Model ${model} not found`, 404);
    this.name = 'GroqModelNotFoundError';
  }
}
