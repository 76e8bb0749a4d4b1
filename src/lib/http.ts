import { backoffDelay, sleep } from './backoff.js';

export const USER_AGENT = 'preprint-shelf/0.1 (personal archive)';

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly url: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface RetryOptions {
  /** Prefix for error messages, e.g. "arXiv fetch". */
  label?: string;
  maxAttempts?: number;
  timeoutMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * `fetch` with a hard per-attempt timeout. Network errors, timeouts, 429 and
 * 5xx are retried with exponential backoff; any other non-2xx throws
 * `HttpError` immediately.
 */
export async function fetchWithRetry(url: string, init: RequestOptions = {}, opts: RetryOptions = {}): Promise<Response> {
  const { label = 'HTTP request', maxAttempts = 5, timeoutMs = 30_000 } = opts;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const signal = AbortSignal.timeout(timeoutMs);
    let res: Response;
    try {
      res = await fetch(url, {
        ...init,
        signal,
        headers: { 'User-Agent': USER_AGENT, ...init.headers },
      });
    } catch (err) {
      // Timeout (AbortError) or network error
      if (attempt === maxAttempts) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new Error(`${label} failed (attempt ${attempt}): ${msg}`);
      }
      await sleep(backoffDelay(attempt));
      continue;
    }

    if (res.ok) return res;

    // release the connection; the error body is not used
    await res.body?.cancel();
    if (!isRetryableStatus(res.status) || attempt === maxAttempts) {
      throw new HttpError(`${label} failed: ${res.status} ${res.statusText}`, res.status, url);
    }

    await sleep(backoffDelay(attempt));
  }

  throw new Error(`${label} failed: exceeded retries`);
}
