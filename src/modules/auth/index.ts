/**
 * Authentication Module Public API
 *
 * Exports types, use cases, adapters, and middleware for the session gate.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  UserId,
  UserIdentity,
  TransportKind,
  Session,
  SessionLookup,
  CredentialSubmission,
  Credentials,
  LoginFlow,
  AuthDecision,
  AllowedDecision,
  ChallengeDecision,
  ChallengeReason,
  AuthGateConfig,
} from './core/types.js';

export type {
  AuthError,
  VerificationError,
  SessionCreateError,
  LoginPageError,
} from './core/errors.js';

export type {
  CredentialVerifier,
  VerifyOptions,
  SessionStore,
  SessionExtractor,
  Clock,
  TokenGenerator,
} from './core/ports.js';

export type { LoginTemplate } from './core/login-page.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export {
  AUTH_HEADER,
  BEARER_PREFIX,
  DEFAULT_PROCEED,
  DEFAULT_INJECTED_PARAM,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_TOKEN_BYTES,
  DEFAULT_VERIFIER_TIMEOUT_MS,
  MIN_TOKEN_BYTES,
  PROCEED_PLACEHOLDER,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Constructors & Guards
// ─────────────────────────────────────────────────────────────────────────────

export { toUserId, isAllowed, transportFor } from './core/types.js';

export { systemClock } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createMalformedRequestError,
  createRequestAbortedError,
  createInvalidCredentialsError,
  createVerifierTimeoutError,
  createCredentialVerifierError,
  createSessionStoreError,
  createTokenCollisionError,
  createTemplateSubstitutionError,
  createLoginPageUnavailableError,
  AUTH_ERROR_HTTP_STATUS,
  isAuthenticationFailure,
  toErrorBody,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Logic
// ─────────────────────────────────────────────────────────────────────────────

export { sanitizeProceed, isSafeProceedPath } from './core/proceed.js';

export { parseCredentialSubmission, flowForContentType } from './core/credentials.js';

export {
  escapeHtml,
  buildDefaultLoginTemplate,
  validateLoginTemplate,
  renderLoginPage,
} from './core/login-page.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  authenticateRequest,
  type AuthenticateRequestDeps,
  type AuthenticateRequestInput,
} from './core/usecases/authenticate-request.js';

export { login, MAX_TOKEN_ATTEMPTS, type LoginDeps, type LoginInput } from './core/usecases/login.js';

export { logout, type LogoutDeps, type LogoutInput } from './core/usecases/logout.js';

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

// Session stores
export {
  makeInMemorySessionStore,
  type InMemorySessionStore,
  type MakeInMemorySessionStoreOptions,
} from './shell/adapters/in-memory-session-store.js';

export {
  makeRedisSessionStore,
  type RedisSessionStoreOptions,
  type SessionRedisClient,
} from './shell/adapters/redis-session-store.js';

// Credential verifiers
export {
  makeInMemoryCredentialVerifier,
  type InMemoryUser,
  type MakeInMemoryCredentialVerifierOptions,
} from './shell/adapters/in-memory-credential-verifier.js';

export {
  makeUserDirectoryVerifier,
  type UserDirectoryVerifierOptions,
} from './shell/adapters/user-directory-verifier.js';

export {
  withVerifierTimeout,
  type WithVerifierTimeoutOptions,
} from './shell/adapters/timeout-verifier.js';

export { hashPassword, verifyPassword } from './shell/crypto/password-hasher.js';

// ─────────────────────────────────────────────────────────────────────────────
// HTTP
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeHttpSessionExtractor,
  parseBearerHeader,
} from './shell/extractors/http-extractor.js';

export {
  makeTokenCodec,
  type TokenCodec,
  type MakeTokenCodecOptions,
} from './shell/codec/token-codec.js';

export { loadLoginTemplate } from './shell/templates/login-page-loader.js';

export {
  makeAuthGate,
  watchClientAbort,
  type AuthGate,
  type MakeAuthGateDeps,
  type InjectedIdentity,
  type ProtectedHandler,
} from './shell/middleware/fastify-auth.js';

export { makeAuthRoutes, authRoutePath, type MakeAuthRoutesDeps } from './shell/rest/routes.js';
