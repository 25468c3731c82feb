/**
 * Fail-soft JSON fetch for third-party providers.
 *
 * Returns null on network error, timeout or non-2xx status and logs the
 * reason under the caller's tag. Providers treat null as "no result".
 */

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface SoftFetchOptions {
  tag: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

export async function fetchJsonSoft(url: string, options: SoftFetchOptions): Promise<unknown> {
  const { tag, headers, timeoutMs = DEFAULT_TIMEOUT_MS, fetchImpl = fetch } = options;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { headers, signal: controller.signal });

    if (!response.ok) {
      console.warn(`[${tag}] Request failed: ${response.status} ${response.statusText}`);
      return null;
    }

    return await response.json();
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      console.warn(`[${tag}] Request timed out after ${timeoutMs}ms`);
    } else {
      console.warn(`[${tag}] Request error:`, error);
    }
    return null;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Append query params to a base URL.
 */
export function withQuery(base: string, params: Record<string, string | number>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${base}?${search}`;
}
