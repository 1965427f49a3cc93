import type { AppConfig, PortalRules } from "../config";
import { AuthError, FetchError } from "../core/errors";
import { createFetch, isAbortError } from "../core/fetch";
import type { FetchLike } from "../core/fetch";
import { CookieJar } from "./cookieJar";
import { buildLoginSubmission, hasPasswordInput } from "./loginForm";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;

export interface PortalClientOptions {
  baseUrl: string;
  loginPath: string;
  resultsPath?: string;
  userAgent: string;
  requestTimeoutMs: number;
  rules: Pick<PortalRules, "usernameFieldNames" | "secretFieldNames">;
  fetchFn: FetchLike;
}

/**
 * Authenticated handle for one user. Lives for a single monitor cycle and is
 * dropped afterwards; nothing in it is persisted.
 */
export interface PortalSessionHandle {
  readonly username: string;
  readonly cookies: CookieJar;
  readonly landingUrl: string;
  readonly resultsUrl: string;
}

export type PortalPage = { kind: "results" } | { kind: "document"; url: string };

export interface FetchedPage {
  url: string;
  status: number;
  contentType: string;
  contentDisposition?: string;
  body: Buffer;
}

export interface PortalGateway {
  authenticate(username: string, secret: string): Promise<PortalSessionHandle>;
  fetch(session: PortalSessionHandle, page: PortalPage): Promise<FetchedPage>;
}

interface RequestSpec {
  method: "GET" | "POST";
  body?: string;
}

export function pageText(page: FetchedPage): string {
  return page.body.toString("utf-8");
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function normalizePath(url: string): string {
  const pathname = new URL(url).pathname.replace(/\/+$/, "");
  return pathname.toLowerCase();
}

export class PortalClient implements PortalGateway {
  private readonly options: PortalClientOptions;

  constructor(options: PortalClientOptions) {
    this.options = options;
  }

  static fromConfig(config: AppConfig, fetchFn?: FetchLike): PortalClient {
    return new PortalClient({
      baseUrl: config.portalBaseUrl,
      loginPath: config.loginPath,
      resultsPath: config.resultsPath,
      userAgent: config.userAgent,
      requestTimeoutMs: config.requestTimeoutMs,
      rules: config.portalRules,
      fetchFn: fetchFn ?? createFetch(config.ignoreHttpsErrors),
    });
  }

  get loginUrl(): string {
    return new URL(this.options.loginPath, this.options.baseUrl).toString();
  }

  async authenticate(username: string, secret: string): Promise<PortalSessionHandle> {
    const jar = new CookieJar();

    const loginPage = await this.requestForLogin(jar, this.loginUrl, { method: "GET" });
    if (!isSuccess(loginPage.status)) {
      throw new AuthError("unreachable", `login page returned HTTP ${loginPage.status}`);
    }

    const submission = buildLoginSubmission(pageText(loginPage), loginPage.url, username, secret, this.options.rules);
    if (!submission) {
      throw new AuthError("unexpected_page", "login form not found on the portal login page");
    }

    const landing = await this.requestForLogin(jar, submission.actionUrl, {
      method: "POST",
      body: submission.fields.toString(),
    });
    if (landing.status === 401 || landing.status === 403) {
      throw new AuthError("invalid_credentials", "portal rejected the credentials");
    }
    if (!isSuccess(landing.status)) {
      throw new AuthError("unreachable", `login submission returned HTTP ${landing.status}`);
    }
    if (hasPasswordInput(pageText(landing))) {
      throw new AuthError("invalid_credentials", "portal rejected the credentials");
    }

    const resultsUrl = this.options.resultsPath
      ? new URL(this.options.resultsPath, this.options.baseUrl).toString()
      : landing.url;

    return {
      username,
      cookies: jar,
      landingUrl: landing.url,
      resultsUrl,
    };
  }

  async fetch(session: PortalSessionHandle, page: PortalPage): Promise<FetchedPage> {
    const url = page.kind === "results" ? session.resultsUrl : page.url;
    const fetched = await this.request(session.cookies, url, { method: "GET" });

    if (!isSuccess(fetched.status)) {
      throw new FetchError("http_status", `HTTP ${fetched.status} while fetching ${url}`, {
        statusCode: fetched.status,
      });
    }

    // A results URL that is itself the login path cannot be told apart by URL alone.
    const expired = this.isLoginUrl(url)
      ? fetched.contentType.includes("html") && hasPasswordInput(pageText(fetched))
      : this.isLoginUrl(fetched.url);
    if (expired) {
      throw new FetchError("session_expired", `session expired while fetching ${url}`);
    }

    return fetched;
  }

  private isLoginUrl(url: string): boolean {
    return normalizePath(url) === normalizePath(this.loginUrl);
  }

  private async requestForLogin(jar: CookieJar, url: string, init: RequestSpec): Promise<FetchedPage> {
    try {
      return await this.request(jar, url, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError("unreachable", `login endpoint unreachable: ${message}`, { cause: error });
    }
  }

  private async request(jar: CookieJar, url: string, init: RequestSpec): Promise<FetchedPage> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    let currentUrl = url;
    let method = init.method;
    let body = init.body;

    try {
      for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
        const headers: Record<string, string> = {
          "user-agent": this.options.userAgent,
          accept: "text/html,application/xhtml+xml,application/pdf,*/*",
        };
        const cookie = jar.header();
        if (cookie) {
          headers.cookie = cookie;
        }
        if (body !== undefined) {
          headers["content-type"] = "application/x-www-form-urlencoded";
        }

        const response = await this.options.fetchFn(currentUrl, {
          method,
          headers,
          body,
          redirect: "manual",
          signal: controller.signal,
        });
        jar.storeFrom(response.headers);

        const location = response.headers.get("location");
        if (REDIRECT_STATUSES.has(response.status) && location) {
          currentUrl = new URL(location, currentUrl).toString();
          if (response.status !== 307 && response.status !== 308) {
            method = "GET";
            body = undefined;
          }
          continue;
        }

        return {
          url: currentUrl,
          status: response.status,
          contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
          contentDisposition: response.headers.get("content-disposition") ?? undefined,
          body: Buffer.from(await response.arrayBuffer()),
        };
      }
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (isAbortError(error) || controller.signal.aborted) {
        throw new FetchError("timeout", `request timed out after ${this.options.requestTimeoutMs}ms: ${url}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError("network", `network error while fetching ${url}: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    throw new FetchError("network", `too many redirects while fetching ${url}`);
  }
}
