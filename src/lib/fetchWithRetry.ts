import type { Logger } from "./logging";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchWithRetryOptions {
  maxRetries: number;
  logger: Logger;
  fetchImpl?: FetchFn;
  /** First backoff step; doubles on each retry. */
  retryBaseDelayMs?: number;
}

function isTransient(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Retries rate limits and server errors with exponential backoff; other responses come back as they are. */
export function createFetchWithRetry(options: FetchWithRetryOptions): FetchFn {
  const fetchImpl: FetchFn = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const baseDelayMs = options.retryBaseDelayMs ?? 500;

  async function doFetchWithRetry(url: string, init: RequestInit, attempt = 1): Promise<Response> {
    const response = await fetchImpl(url, init);

    if (isTransient(response.status) && attempt < options.maxRetries) {
      const delayMs = 2 ** (attempt - 1) * baseDelayMs;
      options.logger.log("warn", "transient_error_retrying", { status: response.status, attempt, delay_ms: delayMs });
      await new Promise((r) => setTimeout(r, delayMs));
      return doFetchWithRetry(url, init, attempt + 1);
    }

    return response;
  }

  return (url, init) => doFetchWithRetry(url, init);
}

export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
