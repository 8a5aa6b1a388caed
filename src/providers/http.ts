/**
 * Shared HTTP client handed to every swarm task.
 *
 * Holds no per-request state, so one instance serves concurrent calls.
 */

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Headers sent with every request; per-call headers win */
  defaultHeaders?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  text: string;
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly defaultHeaders: Readonly<Record<string, string>>;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.defaultHeaders = { ...options.defaultHeaders };
  }

  /**
   * POST a JSON body and read the full response text.
   * Rejects only when no response arrives; HTTP errors resolve with ok=false.
   */
  async postJson(url: string, headers: Record<string, string>, body: unknown): Promise<HttpResponse> {
    const res = await this.fetchFn(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...this.defaultHeaders,
        ...headers,
      },
      body: JSON.stringify(body),
    });
    return { status: res.status, ok: res.ok, text: await res.text() };
  }
}
