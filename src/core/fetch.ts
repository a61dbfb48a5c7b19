import { Agent, fetch as undiciFetch } from "undici";
import { errorMessage, FetchError, type FetchErrorKind } from "./errors";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  headers: {
    get(name: string): string | null;
  };
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Agent;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

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

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

export function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function statusErrorKind(status: number): FetchErrorKind {
  return isRetriableStatus(status) ? "transient" : "permanent";
}

export function isTransientError(error: unknown): boolean {
  return error instanceof FetchError && error.kind === "transient";
}

export interface TextResponse {
  ok: boolean;
  status: number;
  headers: HttpResponseLike["headers"];
  body: string;
}

/**
 * Issues one GET and reads its body under a single timeout. Network failures
 * and timeouts surface as transient `FetchError`s; any HTTP status is returned.
 */
export async function getWithTimeout(
  fetchFn: FetchLike,
  url: string,
  options: { headers: Record<string, string>; timeoutMs: number; dispatcher?: Agent },
): Promise<TextResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: options.headers,
      signal: controller.signal,
      dispatcher: options.dispatcher,
    });
    const body = await response.text();
    return { ok: response.ok, status: response.status, headers: response.headers, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FetchError("transient", `Timed out after ${options.timeoutMs}ms fetching ${url}`, undefined, { cause: error });
    }
    throw new FetchError("transient", `Network error fetching ${url}: ${errorMessage(error)}`, undefined, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}
