/**
 * A single cookie captured from the platform.
 * `expires` is a Unix timestamp in seconds; absent or -1 means a browser-session cookie.
 */
export interface SessionCookie {
  name: string;
  value: string;
  domain?: string | undefined;
  path?: string | undefined;
  expires?: number | undefined;
}

/**
 * Converts a cookie as a browser reports it. Browsers mark domain cookies with
 * a leading dot; a bare host means host-only, so the domain is dropped.
 */
export function fromBrowserCookie(cookie: {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
}): SessionCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    ...(cookie.domain.startsWith(".") ? { domain: cookie.domain } : {}),
    path: cookie.path,
    expires: cookie.expires,
  };
}

/**
 * Authenticated state for one platform origin.
 *
 * Immutable and shared read-only by every worker. Cookie values live in a
 * private field, so neither JSON.stringify nor util.inspect prints them.
 */
export class Session {
  readonly origin: string;
  /** Earliest expiry among persistent cookies, if any */
  readonly expiresAt: Date | undefined;
  readonly #cookies: readonly SessionCookie[];

  constructor(origin: string, cookies: readonly SessionCookie[]) {
    this.origin = new URL(origin).origin;
    this.#cookies = Object.freeze(cookies.map((cookie) => Object.freeze({ ...cookie })));

    const expiries = cookies
      .map((cookie) => cookie.expires)
      .filter((expires): expires is number => expires !== undefined && expires > 0);
    this.expiresAt = expiries.length > 0 ? new Date(Math.min(...expiries) * 1000) : undefined;
    Object.freeze(this);
  }

  get cookieCount(): number {
    return this.#cookies.length;
  }

  /**
   * Value for the `Cookie` request header.
   */
  cookieHeader(): string {
    return this.#cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
  }

  /**
   * Cookie header for a request to another URL, following cookie domain
   * matching: host-only cookies go to the session's own host, domain cookies
   * to that domain and its subdomains. Empty when nothing applies.
   */
  cookieHeaderFor(url: string): string {
    const host = new URL(url).hostname;
    const ownHost = new URL(this.origin).hostname;

    return this.#cookies
      .filter((cookie) => {
        if (!cookie.domain) return host === ownHost;
        const domain = cookie.domain.replace(/^\./, "").toLowerCase();
        return host === domain || host.endsWith(`.${domain}`);
      })
      .map((cookie) => `${cookie.name}=${cookie.value}`)
      .join("; ");
  }

  /**
   * Copies of the cookies, for the encrypted vault only.
   */
  exportCookies(): SessionCookie[] {
    return this.#cookies.map((cookie) => ({ ...cookie }));
  }

  isExpired(now: Date = new Date()): boolean {
    return this.expiresAt !== undefined && this.expiresAt.getTime() <= now.getTime();
  }

  toString(): string {
    return `Session(${this.origin}, ${this.#cookies.length} cookies)`;
  }
}
