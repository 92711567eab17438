/**
 * Authentication Module - Domain Errors
 *
 * All authentication errors are discriminated unions with a 'type' field.
 * Follows neverthrow Result pattern - no thrown exceptions in core.
 *
 * A missing, unknown or expired session is NOT an error: the gate answers it
 * with a login challenge.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Request Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Login body is missing required fields or has an unsupported content type.
 */
export interface MalformedRequestError {
  readonly type: 'MalformedRequestError';
  readonly message: string;
  readonly field?: string | undefined;
}

/**
 * The client went away before the login completed. Nothing was persisted.
 */
export interface RequestAbortedError {
  readonly type: 'RequestAbortedError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Verification Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Username/password rejected. Does not say which of the two was wrong.
 */
export interface InvalidCredentialsError {
  readonly type: 'InvalidCredentialsError';
  readonly message: string;
}

/**
 * Credential verifier did not answer in time. Treated as a verification failure.
 */
export interface VerifierTimeoutError {
  readonly type: 'VerifierTimeoutError';
  readonly message: string;
  readonly timeoutMs: number;
}

/**
 * Credential verifier could not be reached or failed unexpectedly.
 */
export interface CredentialVerifierError {
  readonly type: 'CredentialVerifierError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session Store Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session store communication failed.
 */
export interface SessionStoreError {
  readonly type: 'SessionStoreError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * The store already holds a session under the generated token.
 */
export interface TokenCollisionError {
  readonly type: 'TokenCollisionError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Login page template lacks the proceed placeholder.
 */
export interface TemplateSubstitutionError {
  readonly type: 'TemplateSubstitutionError';
  readonly message: string;
  readonly source: string;
}

/**
 * Configured login page could not be read.
 */
export interface LoginPageUnavailableError {
  readonly type: 'LoginPageUnavailableError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Failures a credential verifier may report.
 */
export type VerificationError =
  | InvalidCredentialsError
  | VerifierTimeoutError
  | CredentialVerifierError;

/**
 * Failures of creating a session.
 */
export type SessionCreateError = SessionStoreError | TokenCollisionError;

/**
 * Failures of loading or rendering the login page.
 */
export type LoginPageError = TemplateSubstitutionError | LoginPageUnavailableError;

/**
 * All possible authentication errors.
 */
export type AuthError =
  | MalformedRequestError
  | RequestAbortedError
  | VerificationError
  | SessionCreateError
  | LoginPageError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMalformedRequestError = (
  message: string,
  field?: string
): MalformedRequestError => ({
  type: 'MalformedRequestError',
  message,
  ...(field !== undefined && { field }),
});

export const createRequestAbortedError = (): RequestAbortedError => ({
  type: 'RequestAbortedError',
  message: 'Request aborted by client',
});

export const createInvalidCredentialsError = (): InvalidCredentialsError => ({
  type: 'InvalidCredentialsError',
  message: 'Invalid credentials',
});

export const createVerifierTimeoutError = (timeoutMs: number): VerifierTimeoutError => ({
  type: 'VerifierTimeoutError',
  message: `Credential verification timed out after ${String(timeoutMs)}ms`,
  timeoutMs,
});

export const createCredentialVerifierError = (
  message: string,
  cause?: unknown
): CredentialVerifierError => ({
  type: 'CredentialVerifierError',
  message,
  retryable: true,
  cause,
});

export const createSessionStoreError = (message: string, cause?: unknown): SessionStoreError => ({
  type: 'SessionStoreError',
  message,
  retryable: true,
  cause,
});

export const createTokenCollisionError = (): TokenCollisionError => ({
  type: 'TokenCollisionError',
  message: 'A session already exists for the generated token',
});

export const createTemplateSubstitutionError = (source: string): TemplateSubstitutionError => ({
  type: 'TemplateSubstitutionError',
  message: `Login page template from ${source} does not contain the {0} proceed placeholder`,
  source,
});

export const createLoginPageUnavailableError = (
  path: string,
  cause?: unknown
): LoginPageUnavailableError => ({
  type: 'LoginPageUnavailableError',
  message: `Login page ${path} could not be read`,
  path,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping to HTTP Status
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps auth errors to HTTP status codes.
 * Used by shell layer for response generation.
 */
export const AUTH_ERROR_HTTP_STATUS: Record<AuthError['type'], number> = {
  MalformedRequestError: 400,
  RequestAbortedError: 499,
  InvalidCredentialsError: 401,
  VerifierTimeoutError: 401,
  CredentialVerifierError: 503,
  SessionStoreError: 503,
  TokenCollisionError: 503,
  TemplateSubstitutionError: 500,
  LoginPageUnavailableError: 500,
} as const;

/**
 * Bad credentials and verifier timeouts are indistinguishable to the caller.
 */
export const isAuthenticationFailure = (
  error: AuthError
): error is InvalidCredentialsError | VerifierTimeoutError => {
  return error.type === 'InvalidCredentialsError' || error.type === 'VerifierTimeoutError';
};

/**
 * Public error body for an auth error. Authentication failures collapse into one
 * body; server-side failures do not echo internal messages.
 */
export const toErrorBody = (
  error: AuthError
): { ok: false; error: string; message: string } => {
  if (isAuthenticationFailure(error)) {
    return { ok: false, error: 'AuthenticationFailed', message: 'Invalid credentials' };
  }

  if (error.type === 'MalformedRequestError') {
    return { ok: false, error: error.type, message: error.message };
  }

  const status = AUTH_ERROR_HTTP_STATUS[error.type];
  return {
    ok: false,
    error: error.type,
    message: status >= 500 ? 'Authentication service unavailable' : error.message,
  };
};
