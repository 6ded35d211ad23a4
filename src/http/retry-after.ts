import type { AxiosResponse } from 'axios';

/** Milliseconds the service asked us to wait, from the Retry-After header (seconds or HTTP-date) */
export function retryAfterMs(response: Pick<AxiosResponse, 'headers'> | undefined): number | null {
  if (!response || !response.headers) return null;
  const retryAfter: unknown = response.headers['retry-after'];

  if (typeof retryAfter === 'number' && Number.isFinite(retryAfter)) {
    return Math.max(retryAfter * 1000, 0);
  }
  if (typeof retryAfter === 'string' && retryAfter.trim()) {
    const seconds = Number.parseFloat(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(Math.round(seconds * 1000), 0);

    // HTTP-date form
    const at = Date.parse(retryAfter);
    if (Number.isFinite(at)) return Math.max(at - Date.now(), 0);
  }

  return null;
}
