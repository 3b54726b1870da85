/**
 * Error taxonomy shared by the whole pipeline.
 *
 * Every error carries a stable `code` so callers can branch on it and the
 * end-of-run summary can group failures without string matching.
 */

export type ErrorCode =
  | "NETWORK_ERROR"
  | "AUTH_ERROR"
  | "SCHEMA_ERROR"
  | "INTEGRITY_ERROR"
  | "USER_INPUT_ERROR"
  | "VAULT_VERSION_ERROR";

export class LectureCapError extends Error {
  public readonly code: ErrorCode;
  public readonly details: string | undefined;

  constructor(
    message: string,
    code: ErrorCode,
    options: { cause?: unknown; details?: string | undefined } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "LectureCapError";
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Transient transport failure: connection refused, timeout, 408/429/5xx.
 */
export class NetworkError extends LectureCapError {
  public readonly statusCode: number | undefined;

  constructor(
    message: string,
    options: { cause?: unknown; details?: string | undefined; statusCode?: number | undefined } = {}
  ) {
    super(message, "NETWORK_ERROR", options);
    this.name = "NetworkError";
    this.statusCode = options.statusCode;
  }
}

/**
 * Wrong passphrase, tampered vault, or an expired/rejected session.
 * Not retryable without new credentials.
 */
export class AuthError extends LectureCapError {
  constructor(message: string, options: { cause?: unknown; details?: string | undefined } = {}) {
    super(message, "AUTH_ERROR", options);
    this.name = "AuthError";
  }
}

/**
 * The platform answered with JSON we do not understand.
 */
export class SchemaError extends LectureCapError {
  constructor(message: string, options: { cause?: unknown; details?: string | undefined } = {}) {
    super(message, "SCHEMA_ERROR", options);
    this.name = "SchemaError";
  }
}

export class IntegrityError extends LectureCapError {
  public readonly expectedBytes: number;
  public readonly actualBytes: number;

  constructor(expectedBytes: number, actualBytes: number) {
    super(
      `Size mismatch: expected ${expectedBytes} bytes, got ${actualBytes}`,
      "INTEGRITY_ERROR"
    );
    this.name = "IntegrityError";
    this.expectedBytes = expectedBytes;
    this.actualBytes = actualBytes;
  }
}

export class UserInputError extends LectureCapError {
  constructor(message: string, options: { details?: string | undefined } = {}) {
    super(message, "USER_INPUT_ERROR", options);
    this.name = "UserInputError";
  }
}

/**
 * The vault file was written by an unknown format or version.
 */
export class VaultVersionError extends LectureCapError {
  public readonly foundVersion: unknown;

  constructor(foundVersion: unknown, supported: number) {
    super(
      `Unsupported vault version ${String(foundVersion)} (this build reads version ${supported})`,
      "VAULT_VERSION_ERROR"
    );
    this.name = "VaultVersionError";
    this.foundVersion = foundVersion;
  }
}

/**
 * Formats any thrown value as a single line.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP statuses worth another attempt.
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 413, 429, 500, 502, 503, 504];

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

export function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}
