export class ServiceError extends Error {
  constructor(
    message: string,
    public service: string,
    public status?: number,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

/** Pull a human readable message out of a JSON error body, if the service sent one */
export function extractErrorDetail(body: unknown): string | undefined {
  if (typeof body === 'string') return body.trim() || undefined;
  if (typeof body !== 'object' || body === null) return undefined;

  for (const key of ['error', 'detail', 'message']) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string' && value.length > 0) return value;
    const nested = extractErrorDetail(value);
    if (nested) return nested;
  }
  return undefined;
}
