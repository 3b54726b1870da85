/**
 * Session acquisition: reuse an encrypted vault when its cookies still work,
 * otherwise hand over to an interactive login and offer to save the result.
 */
import type { Course } from "../scraper/course.js";
import { getCourseHomeUrl } from "../scraper/course.js";
import { isPlatformLoginPage } from "../shared/auth.js";
import { AuthError, errorMessage } from "../shared/errors.js";
import { pathExists } from "../shared/fs.js";
import { createPlatformClient, type FetchLike, toTransportError } from "../shared/http.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { Session, type SessionCookie } from "./session.js";
import { loadVault, saveVault } from "./vault.js";

export interface Credentials {
  username: string;
  password?: string | undefined;
}

/**
 * Drives the platform's login form and returns the cookies set once the
 * post-login redirect is observed. May block while a human completes it.
 */
export interface LoginCapability {
  performLogin(loginUrl: string, credentials: Credentials): Promise<SessionCookie[]>;
}

export interface SessionProviderOptions {
  login: LoginCapability;
  /** Asks the user for credentials; only called when a login is needed */
  requestCredentials: () => Promise<Credentials>;
  /** Returns a passphrase to save the new session with, or null to skip */
  offerPersistence?: (() => Promise<string | null>) | undefined;
  isLoginPage?: ((url: string) => boolean) | undefined;
  timeoutMs?: number | undefined;
  fetch?: FetchLike | undefined;
  logger?: Logger | undefined;
}

export class SessionProvider {
  private readonly options: SessionProviderOptions;
  private readonly isLoginPage: (url: string) => boolean;
  private readonly logger: Logger;

  constructor(options: SessionProviderOptions) {
    this.options = options;
    this.isLoginPage = options.isLoginPage ?? isPlatformLoginPage;
    this.logger = options.logger ?? createLogger("session");
  }

  /**
   * Returns a session valid for the course's origin.
   */
  async acquire(course: Course, vaultPath?: string, passphrase?: string): Promise<Session> {
    if (vaultPath && passphrase) {
      const saved = await this.fromVault(course, vaultPath, passphrase);
      if (saved) {
        return saved;
      }
    }

    const session = await this.login(course);

    if (vaultPath && this.options.offerPersistence) {
      await this.persist(session, vaultPath, this.options.offerPersistence);
    }

    return session;
  }

  /**
   * One authenticated GET of the course home page.
   * False when the platform refuses it or bounces to a login page.
   */
  async probe(course: Course, session: Session): Promise<boolean> {
    const client = createPlatformClient(session, {
      timeoutMs: this.options.timeoutMs,
      fetch: this.options.fetch,
    });
    const url = getCourseHomeUrl(course);

    let response: Response;
    try {
      response = await client.get(url, { throwHttpErrors: false });
    } catch (error) {
      throw toTransportError(error, url);
    }

    if (!response.ok) {
      this.logger.debug(`Probe answered HTTP ${response.status}`);
      return false;
    }
    if (response.url && this.isLoginPage(response.url)) {
      this.logger.debug("Probe was redirected to the login page");
      return false;
    }
    return true;
  }

  private async fromVault(
    course: Course,
    vaultPath: string,
    passphrase: string
  ): Promise<Session | null> {
    if (!(await pathExists(vaultPath))) {
      return null;
    }

    let cookies: SessionCookie[];
    try {
      const contents = await loadVault(vaultPath, passphrase);
      if (contents.origin !== course.origin) {
        this.logger.debug(`Saved session belongs to ${contents.origin}, not ${course.origin}`);
        return null;
      }
      cookies = contents.cookies;
    } catch (error) {
      this.logger.warn(`Could not use saved session: ${errorMessage(error)}`);
      return null;
    }

    const session = new Session(course.origin, cookies);
    if (session.isExpired()) {
      this.logger.info("Saved session has expired, logging in again.");
      return null;
    }

    if (await this.probe(course, session)) {
      this.logger.debug("Saved session is still valid");
      return session;
    }

    this.logger.info("Saved session is stale, logging in again.");
    return null;
  }

  private async login(course: Course): Promise<Session> {
    const credentials = await this.options.requestCredentials();
    const cookies = await this.options.login.performLogin(course.url, credentials);

    if (cookies.length === 0) {
      throw new AuthError("Login finished without any session cookies");
    }

    const session = new Session(course.origin, cookies);
    if (!(await this.probe(course, session))) {
      throw new AuthError("Login did not produce a usable session", { details: course.origin });
    }
    return session;
  }

  private async persist(
    session: Session,
    vaultPath: string,
    offer: () => Promise<string | null>
  ): Promise<void> {
    const passphrase = await offer();
    if (!passphrase) {
      return;
    }

    try {
      await saveVault(
        vaultPath,
        {
          origin: session.origin,
          cookies: session.exportCookies(),
          savedAt: new Date().toISOString(),
        },
        passphrase
      );
      this.logger.debug(`Session saved to ${vaultPath}`);
    } catch (error) {
      this.logger.warn(`Could not save session: ${errorMessage(error)}`);
    }
  }
}
