// src/loader/fetch.ts

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export interface HttpFetchOptions {
  timeout?: number;
}

export const DEFAULT_TIMEOUT = 10_000;
const USER_AGENT = 'schema-depot/0.1';

/**
 * GET a URL with a timeout. Header names are lowercased.
 * Throws on transport failure or timeout; any HTTP status is returned.
 */
export async function httpGet(url: string, options: HttpFetchOptions = {}): Promise<HttpResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'GET',
      signal: controller.signal,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'application/schema+json, application/json, */*',
      },
      redirect: 'follow',
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    const body = Buffer.from(await response.arrayBuffer());
    return { status: response.status, headers, body };
  } finally {
    clearTimeout(timer);
  }
}

/** Parse an HTTP date into epoch milliseconds; 0 when absent or unparseable. */
export function parseHttpDate(value: string | undefined): number {
  if (!value) return 0;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? 0 : ms;
}
