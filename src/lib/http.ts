/**
 * Shortwire — HTTP helpers
 *
 * Thin wrappers over global fetch. Every request carries its own timeout
 * and also aborts when the caller's signal (the ingestion deadline) fires.
 */

import { HttpStatusError } from './errors';

export const USER_AGENT = 'shortwire/0.1 (+tech-news ingestion)';

export interface RequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

function linkSignals(timeoutMs: number, parent?: AbortSignal): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)),
    timeoutMs
  );

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

async function request<T>(
  url: string,
  options: RequestOptions,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const { signal, dispose } = linkSignals(options.timeoutMs, options.signal);

  // The timeout covers the body as well as the headers
  try {
    const res = await fetch(url, {
      signal,
      headers: { 'User-Agent': USER_AGENT, ...options.headers },
      redirect: 'follow',
    });
    if (!res.ok) {
      throw new HttpStatusError(res.status, url);
    }
    return await read(res);
  } finally {
    dispose();
  }
}

/**
 * GET a URL and parse the body as JSON. Throws on non-2xx,
 * timeout, abort, or a body that is not valid JSON.
 */
export async function fetchJson(url: string, options: RequestOptions): Promise<unknown> {
  return request(url, options, (res): Promise<unknown> => res.json());
}

/**
 * GET a URL and return the body as text.
 */
export async function fetchText(url: string, options: RequestOptions): Promise<string> {
  return request(url, options, res => res.text());
}
