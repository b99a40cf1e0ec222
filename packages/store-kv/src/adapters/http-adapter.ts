/**
 * HTTP KeyValueClient adapter
 *
 * Talks to a key-value service exposing one resource per key:
 * 1. GET    {baseUrl}/{key} - 200 with the value as text, 404 if missing
 * 2. PUT    {baseUrl}/{key} - store the request body (optional ?ttl=seconds)
 * 3. DELETE {baseUrl}/{key} - remove the key, 404 accepted
 */

import type { KeyValueClient, KeyValueSetOptions } from "../key-value-client.js";

/**
 * Options for HttpKeyValueClient.
 */
export interface HttpKeyValueClientOptions {
  /** Service URL, e.g. "https://kv.example.com/v1/states" */
  baseUrl: string;
  /** Extra headers sent with every request (e.g. authorization) */
  headers?: Record<string, string>;
  /** Custom fetch function (for testing or different environments) */
  fetchFn?: typeof fetch;
}

/**
 * Non-2xx response from the key-value service.
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(method: string, url: string, status: number, statusText: string) {
    super(`${method} ${url} failed: ${status} ${statusText}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/**
 * Releases a response body that will not be read, so the connection can be reused.
 */
async function discard(response: Response): Promise<void> {
  await response.body?.cancel();
}

export class HttpKeyValueClient implements KeyValueClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpKeyValueClientOptions) {
    // Normalize URL
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.headers = options.headers ?? {};
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async get(key: string): Promise<string | null> {
    const url = this.urlOf(key);
    const response = await this.fetchFn(url, {
      method: "GET",
      headers: { ...this.headers, Accept: "text/plain" },
    });

    if (response.status === 404) {
      await discard(response);
      return null;
    }
    if (!response.ok) {
      await discard(response);
      throw new HttpStatusError("GET", url, response.status, response.statusText);
    }
    return response.text();
  }

  async set(key: string, value: string, options?: KeyValueSetOptions): Promise<void> {
    const url =
      options?.ttlSeconds !== undefined
        ? `${this.urlOf(key)}?ttl=${options.ttlSeconds}`
        : this.urlOf(key);
    const response = await this.fetchFn(url, {
      method: "PUT",
      headers: { ...this.headers, "Content-Type": "text/plain" },
      body: value,
    });
    await discard(response);

    if (!response.ok) {
      throw new HttpStatusError("PUT", url, response.status, response.statusText);
    }
  }

  async del(key: string): Promise<void> {
    const url = this.urlOf(key);
    const response = await this.fetchFn(url, {
      method: "DELETE",
      headers: this.headers,
    });
    await discard(response);

    if (!response.ok && response.status !== 404) {
      throw new HttpStatusError("DELETE", url, response.status, response.statusText);
    }
  }

  private urlOf(key: string): string {
    return `${this.baseUrl}/${encodeURIComponent(key)}`;
  }
}
