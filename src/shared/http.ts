import ky, { HTTPError, type KyInstance, TimeoutError } from "ky";
import type { Session } from "../session/session.js";
import { AuthError, NetworkError, SchemaError, isAuthStatus } from "./errors.js";

/**
 * Default User-Agent for HTTP requests.
 * Mimics a standard Chrome browser on macOS.
 */
export const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchLike = typeof fetch;

export interface PlatformClientOptions {
  /** Per-request timeout in ms (default: 30s) */
  timeoutMs?: number | undefined;
  /** Replacement fetch implementation, used by tests */
  fetch?: FetchLike | undefined;
}

/**
 * HTTP client for the platform's JSON API, carrying the session cookies.
 * Retries are left to the caller, which knows which failures are worth it.
 */
export function createPlatformClient(
  session: Session,
  options: PlatformClientOptions = {}
): KyInstance {
  return ky.create({
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/json",
      "Accept-Language": "en-US,en;q=0.5",
      Cookie: session.cookieHeader(),
    },
    timeout: options.timeoutMs ?? 30000,
    retry: 0,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

/**
 * HTTP client for media files. Status codes are handled by the caller,
 * since 206 and 416 matter when resuming.
 */
export function createDownloadClient(options: PlatformClientOptions = {}): KyInstance {
  return ky.create({
    headers: { "User-Agent": USER_AGENT },
    timeout: options.timeoutMs ?? 30000,
    retry: 0,
    throwHttpErrors: false,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

/**
 * Maps a ky/fetch failure onto the error taxonomy.
 * Aborts are passed through untouched so cancellation keeps its identity.
 */
export function toTransportError(error: unknown, url: string): unknown {
  if (error instanceof HTTPError) {
    const status = error.response.status;
    if (isAuthStatus(status)) {
      return new AuthError(`Session rejected (HTTP ${status})`, { cause: error, details: url });
    }
    return new NetworkError(`HTTP ${status} from ${url}`, {
      cause: error,
      statusCode: status,
    });
  }
  if (error instanceof TimeoutError) {
    return new NetworkError(`Request timed out: ${url}`, { cause: error });
  }
  if (error instanceof Error && error.name === "AbortError") {
    return error;
  }
  return new NetworkError(`Request failed: ${url}`, {
    cause: error,
    details: error instanceof Error ? error.message : String(error),
  });
}

/**
 * GETs a JSON document.
 * A redirect onto a login page means the session is no longer accepted.
 */
export async function getJson(
  client: KyInstance,
  url: string,
  isLoginPage: (url: string) => boolean,
  signal?: AbortSignal
): Promise<unknown> {
  let body: string;
  try {
    const response = await client.get(url, signal ? { signal } : {});
    if (response.url && isLoginPage(response.url)) {
      throw new AuthError("Session expired: redirected to the login page", { details: url });
    }
    body = await response.text();
  } catch (error) {
    if (error instanceof AuthError) throw error;
    throw toTransportError(error, url);
  }

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new SchemaError(`Response from ${url} is not JSON`, {
      cause: error,
      details: body.slice(0, 120),
    });
  }
}
