/**
 * Default login page detection patterns.
 * The platform bounces unauthenticated requests to a `login.` host or a
 * `/login` path, usually through an institutional SSO hop.
 */
const DEFAULT_LOGIN_PATTERNS = [
  /^https?:\/\/login\./,
  /\/login(?:[/?#]|$)/,
  /\/signin(?:[/?#]|$)/,
  /\/saml\//i,
  /^https?:\/\/sso\./,
  /login\.microsoftonline\.com/,
  /accounts\.google\.com/,
];

/**
 * Creates a login page checker from patterns.
 */
export function createLoginChecker(
  patterns: RegExp[] = DEFAULT_LOGIN_PATTERNS
): (url: string) => boolean {
  return (url: string) => patterns.some((p) => p.test(url));
}

/**
 * Login page checker for the lecture platform and its identity providers.
 */
export const isPlatformLoginPage = createLoginChecker();
