import { RETRY } from '../config/api.js';
import { ApiError } from '../errors/index.js';
import type { Platform } from '../types/unified.js';

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function truncate(text: string, length: number): string {
    return text.length > length ? text.slice(0, length) : text;
}

function isRateLimited(error: unknown): boolean {
    return error instanceof ApiError && error.statusCode === 429;
}

/**
 * Retry wrapper for requests (handles rate limiting).
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    maxRetries: number = RETRY.MAX_RETRIES,
    baseDelayMs: number = RETRY.BASE_DELAY_MS
  ): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error: unknown) {
        lastError = error;

        if (isRateLimited(error) && attempt < maxRetries - 1) {
          const waitMs = baseDelayMs * Math.pow(2, attempt);
          console.warn(`Rate limited, waiting ${waitMs}ms (attempt ${attempt + 1}/${maxRetries})`);
          await sleep(waitMs);
        } else {
          throw error;
        }
      }
    }

    throw lastError;
  }

/**
 * GET a JSON document, raising ApiError on transport failures and non-2xx
 * responses. The body is trusted to match `T`; normalizers re-check fields.
 */
export async function fetchJson<T>(
    url: string,
    platform: Platform,
    { timeoutMs, headers }: { timeoutMs: number; headers?: Record<string, string> }
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(url, { headers, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Request failed: ${message}`, platform, undefined, { url });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new ApiError(`HTTP ${response.status}`, platform, response.status, { url });
    }

    return (await response.json()) as T;
  }
