import * as log from '../utils/logger.js';

// ── Rate-limit backoff ───────────────────────────────────────
// Both providers share one schedule: three attempts, with Retry-After
// honoured when the server sends it and 5s then 10s between them
// otherwise.

export const MAX_ATTEMPTS = 3;
const STEP_MS = 5_000;

export class RateLimitedError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(`${provider} API: rate limited`);
    this.name = 'RateLimitedError';
  }
}

export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

export function backoffMs(attempt: number, retryAfterMs: number | null): number {
  return retryAfterMs ?? (attempt + 1) * STEP_MS;
}

/**
 * Run `fn` until it succeeds or fails with something other than a
 * rate limit. `classify` maps provider errors onto RateLimitedError.
 */
export async function withRateLimitRetry<T>(
  provider: string,
  fn: () => Promise<T>,
  classify: (err: unknown) => RateLimitedError | null,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((r) => setTimeout(r, ms)),
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const limited = classify(err);
      if (!limited) throw err;
      if (attempt === MAX_ATTEMPTS - 1) {
        throw new Error(`${provider} API: max retries exceeded due to rate limiting`);
      }

      const waitMs = backoffMs(attempt, limited.retryAfterMs);
      log.warn(`Oracle rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await sleep(waitMs);
    }
  }
}
