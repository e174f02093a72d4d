import { type APIRequestContext, errors, request } from 'playwright';
import { FetchError } from './errors';

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

export interface HttpRequestOptions {
  timeoutMs: number;
  headers: Record<string, string>;
}

/** Minimal GET capability the fetcher depends on. */
export interface HttpTransport {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  dispose(): Promise<void>;
}

/**
 * Transport backed by Playwright's APIRequestContext. Plain HTTP only, so no
 * browser has to be installed.
 */
export class PlaywrightTransport implements HttpTransport {
  private context: Promise<APIRequestContext> | null = null;

  constructor(
    private readonly createContext: () => Promise<APIRequestContext> = () => request.newContext()
  ) {}

  private getContext(): Promise<APIRequestContext> {
    if (!this.context) {
      // A context that failed to start is dropped so the next request retries
      const context: Promise<APIRequestContext> = this.createContext().catch((error: unknown) => {
        if (this.context === context) {
          this.context = null;
        }
        throw error;
      });
      this.context = context;
    }
    return this.context;
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const context = await this.getContext();
    const response = await context.get(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      failOnStatusCode: false,
    });

    try {
      return {
        status: response.status(),
        statusText: response.statusText(),
        body: await response.text(),
      };
    } finally {
      await response.dispose();
    }
  }

  async dispose(): Promise<void> {
    const context = this.context;
    this.context = null;
    if (context) {
      await (await context).dispose();
    }
  }
}

export interface FetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

function isTimeout(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) return true;
  return error instanceof Error && /timeout|timed out/i.test(error.message);
}

export class PageFetcher {
  private requests = 0;

  constructor(
    private readonly transport: HttpTransport,
    private readonly options: FetcherOptions
  ) {}

  /** Number of GET requests issued so far, successful or not. */
  get requestCount(): number {
    return this.requests;
  }

  /**
   * Fetches raw markup. Never retries; network failures, timeouts and
   * non-2xx statuses all raise FetchError.
   */
  async fetch(url: string): Promise<string> {
    this.requests++;

    let response: HttpResponse;
    try {
      response = await this.transport.get(url, {
        timeoutMs: this.options.timeoutMs,
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
      });
    } catch (error) {
      const timedOut = isTimeout(error);
      const reason = timedOut
        ? `timed out after ${this.options.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new FetchError(url, reason, { timedOut, cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    return response.body;
  }

  async close(): Promise<void> {
    await this.transport.dispose();
  }
}
