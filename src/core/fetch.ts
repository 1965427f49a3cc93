import { Agent, fetch as undiciFetch, FormData } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpHeadersLike {
  get(name: string): string | null;
  getSetCookie(): string[];
}

export interface HttpResponseLike {
  status: number;
  url: string;
  headers: HttpHeadersLike;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string | FormData;
  redirect?: "manual" | "follow";
  signal?: AbortSignal;
}

/** Narrow fetch signature every HTTP client in the project accepts, so tests can hand in a fake. */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

/** Resolves a possibly relative href, or returns undefined when it is not a valid URL. */
export function resolveUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { FormData };
