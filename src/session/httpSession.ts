import { CookieJar } from "tough-cookie";
import { Dispatcher, fetch, Response } from "undici";
import { AppConfig } from "../config";
import { FetchFn, getFetchDispatcher } from "../core/fetch";
import { Logger } from "../observability";

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

export type QueryParams = Record<string, string | number | boolean>;

export interface SessionRequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  query?: QueryParams;
  body?: string;
  /** When false the first response is returned as-is, redirect or not. */
  followRedirects?: boolean;
  timeoutMs?: number;
}

export interface HttpSessionOptions {
  config: AppConfig;
  logger: Logger;
  dispatcher?: Dispatcher;
  fetchFn?: FetchFn;
  maxRedirects?: number;
}

export class TooManyRedirectsError extends Error {
  constructor(url: string, maxRedirects: number) {
    super(`Exceeded ${maxRedirects} redirects starting at ${url}`);
    this.name = "TooManyRedirectsError";
  }
}

export function withQuery(url: string, query?: QueryParams): string {
  if (!query) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.append(key, String(value));
  }
  return target.toString();
}

/**
 * One browsing session: a cookie jar plus default headers, shared by every request of a run.
 * Redirects are followed here rather than by fetch so cookies set on intermediate hops land in the jar.
 */
export class HttpSession {
  private readonly jar = new CookieJar();
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchFn: FetchFn;
  private readonly maxRedirects: number;
  readonly defaultHeaders: Record<string, string>;

  constructor(options: HttpSessionOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.dispatcher = options.dispatcher ?? getFetchDispatcher(options.config.ignoreHttpsErrors);
    this.fetchFn = options.fetchFn ?? fetch;
    this.maxRedirects = options.maxRedirects ?? 10;
    this.defaultHeaders = {
      "user-agent": options.config.userAgent,
      "accept-language": "en-US,en;q=0.9",
    };
  }

  async clearCookies(): Promise<void> {
    await this.jar.removeAllCookies();
  }

  async cookieNames(url: string): Promise<string[]> {
    const cookies = await this.jar.getCookies(url);
    return cookies.map((cookie) => cookie.key);
  }

  async get(url: string, options: Omit<SessionRequestOptions, "method" | "body"> = {}): Promise<Response> {
    return this.request(url, { ...options, method: "GET" });
  }

  async postForm(
    url: string,
    form: Record<string, string>,
    options: Omit<SessionRequestOptions, "method" | "body"> = {},
  ): Promise<Response> {
    return this.request(url, {
      ...options,
      method: "POST",
      headers: {
        "content-type": "application/x-www-form-urlencoded; charset=UTF-8",
        ...(options.headers ?? {}),
      },
      body: new URLSearchParams(form).toString(),
    });
  }

  async request(url: string, options: SessionRequestOptions = {}): Promise<Response> {
    const followRedirects = options.followRedirects ?? true;
    let currentUrl = withQuery(url, options.query);
    let method = options.method ?? "GET";
    let body = options.body;

    for (let hop = 0; hop <= this.maxRedirects; hop += 1) {
      const response = await this.send(currentUrl, method, body, options);
      const location = response.headers.get("location");
      if (!followRedirects || !REDIRECT_STATUSES.has(response.status) || !location) {
        return response;
      }

      // Discard the redirect body so the connection can be reused.
      await response.body?.cancel();
      const nextUrl = new URL(location, currentUrl).toString();
      this.logger.debug("session_redirect", { url: currentUrl, status: response.status, location: nextUrl });
      if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === "POST")) {
        method = "GET";
        body = undefined;
      }
      currentUrl = nextUrl;
    }

    throw new TooManyRedirectsError(url, this.maxRedirects);
  }

  private async send(
    url: string,
    method: "GET" | "POST",
    body: string | undefined,
    options: SessionRequestOptions,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      ...(options.headers ?? {}),
    };
    const cookieHeader = await this.jar.getCookieString(url);
    if (cookieHeader) {
      headers.cookie = cookieHeader;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? this.config.requestTimeoutMs);
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body,
        redirect: "manual",
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }

    await this.storeCookies(url, response);
    return response;
  }

  private async storeCookies(url: string, response: Response): Promise<void> {
    const setCookies = response.headers.getSetCookie();
    for (const setCookie of setCookies) {
      const stored = await this.jar.setCookie(setCookie, url, { ignoreError: true });
      this.logger.debug("session_cookie_set", { url, cookie: stored ? stored.key : undefined });
    }
  }
}
