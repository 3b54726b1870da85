/**
 * Browser-driven implementation of the login capability.
 * Opens a visible Chromium window; the user finishes any SSO / 2FA steps by hand.
 */
import { chromium, type Page } from "playwright";
import { isPlatformLoginPage } from "../shared/auth.js";
import { AuthError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { Credentials, LoginCapability } from "./provider.js";
import { fromBrowserCookie, type SessionCookie } from "./session.js";

export interface BrowserLoginOptions {
  /** Login timeout in ms (default: 5 minutes) */
  loginTimeout?: number | undefined;
  isLoginPage?: ((url: string) => boolean) | undefined;
}

const logger = createLogger("login");

// ============================================
// Browser automation - not unit testable
// ============================================
/* v8 ignore start */

/**
 * Types the user name into the first e-mail/user field, and the password if
 * one was given and a password field is visible. Missing fields are fine:
 * the user can type into the window directly.
 */
async function prefillForm(page: Page, credentials: Credentials): Promise<void> {
  const userField = page
    .locator('input[type="email"], input[name="email"], input[name="username"], input[name="loginfmt"]')
    .first();
  if (await userField.isVisible().catch(() => false)) {
    await userField.fill(credentials.username);
    const submit = page.locator('button[type="submit"], input[type="submit"]').first();
    if (await submit.isVisible().catch(() => false)) {
      await submit.click();
    }
  }

  if (credentials.password) {
    const passwordField = page.locator('input[type="password"]').first();
    await passwordField.waitFor({ state: "visible", timeout: 10000 }).catch(() => undefined);
    if (await passwordField.isVisible().catch(() => false)) {
      await passwordField.fill(credentials.password);
      await passwordField.press("Enter");
    }
  }
}

export function createBrowserLogin(options: BrowserLoginOptions = {}): LoginCapability {
  const isLoginPage = options.isLoginPage ?? isPlatformLoginPage;

  return {
    async performLogin(loginUrl: string, credentials: Credentials): Promise<SessionCookie[]> {
      const origin = new URL(loginUrl).origin;
      const browser = await chromium.launch({
        headless: false, // Must be visible for user interaction
      });

      try {
        const context = await browser.newContext({ viewport: { width: 1280, height: 800 } });
        const page = await context.newPage();
        await page.goto(loginUrl);

        logger.info("\n🔐 Browser opened. Please complete the login in the window.");
        logger.info("   The window will close automatically after a successful login.\n");

        await prefillForm(page, credentials);

        const timeout = options.loginTimeout ?? 300000;
        const startTime = Date.now();
        let loggedIn = false;

        while (!loggedIn && Date.now() - startTime < timeout) {
          await page.waitForTimeout(500);
          const currentUrl = page.url();
          loggedIn = currentUrl.startsWith(origin) && !isLoginPage(currentUrl);
        }

        if (!loggedIn) {
          throw new AuthError(`Login timed out after ${timeout / 1000} seconds`);
        }

        // Give the page a moment to set its cookies after the redirect
        await page.waitForLoadState("networkidle").catch(() => undefined);

        const cookies = await context.cookies(origin);
        logger.debug(`Captured ${cookies.length} cookies`);
        return cookies.map(fromBrowserCookie);
      } finally {
        await browser.close();
      }
    },
  };
}

/* v8 ignore stop */
