/**
 * Login body parsing.
 *
 * The content type is resolved once here into a tagged CredentialSubmission;
 * nothing downstream looks at the content type again.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createMalformedRequestError, type MalformedRequestError } from './errors.js';
import { sanitizeProceed } from './proceed.js';

import type { CredentialSubmission, LoginFlow } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded' as const;
export const JSON_CONTENT_TYPE = 'application/json' as const;

/**
 * Fields shared by the form and JSON login bodies.
 */
export const LoginFieldsSchema = Type.Object({
  username: Type.String({ minLength: 1, description: 'Account username' }),
  password: Type.String({ minLength: 1, description: 'Account password' }),
  proceed: Type.Optional(
    Type.String({ description: 'Relative path to continue to after login. Default: /' })
  ),
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps a Content-Type header to a login flow, ignoring parameters such as charset.
 */
export const flowForContentType = (contentType: string | undefined): LoginFlow | null => {
  if (contentType === undefined) {
    return null;
  }

  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();

  if (mediaType === FORM_CONTENT_TYPE) {
    return 'form';
  }
  if (mediaType === JSON_CONTENT_TYPE) {
    return 'json';
  }
  return null;
};

const REQUIRED_FIELDS = ['username', 'password'] as const;

const firstMissingField = (body: unknown): string | undefined => {
  if (typeof body !== 'object' || body === null) {
    return REQUIRED_FIELDS[0];
  }

  return REQUIRED_FIELDS.find((field) => {
    const value: unknown = Reflect.get(body, field);
    return typeof value !== 'string' || value === '';
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Parser
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses a login POST body.
 *
 * @param contentType - Raw Content-Type header
 * @param body - Body as decoded by the HTTP layer (object for JSON and form bodies)
 * @returns CredentialSubmission, or MalformedRequestError when the content type is
 *   unsupported or username/password are missing
 */
export function parseCredentialSubmission(
  contentType: string | undefined,
  body: unknown
): Result<CredentialSubmission, MalformedRequestError> {
  const flow = flowForContentType(contentType);

  if (flow === null) {
    return err(
      createMalformedRequestError(
        `Unsupported content type. Expected ${FORM_CONTENT_TYPE} or ${JSON_CONTENT_TYPE}`
      )
    );
  }

  if (!Value.Check(LoginFieldsSchema, body)) {
    const field = firstMissingField(body);
    return err(
      createMalformedRequestError(
        field !== undefined ? `Missing required field: ${field}` : 'Invalid login body',
        field
      )
    );
  }

  return ok({
    flow,
    username: body.username,
    password: body.password,
    proceed: sanitizeProceed(body.proceed),
  });
}
