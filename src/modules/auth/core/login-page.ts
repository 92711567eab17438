/**
 * Login page templates.
 *
 * A template is HTML containing the `{0}` placeholder, substituted with the
 * (escaped) proceed path when a challenge is rendered. Only the field contract
 * is load-bearing: a form with `username`, `password` and a hidden `proceed`.
 */

import { err, ok, type Result } from 'neverthrow';

import { createTemplateSubstitutionError, type TemplateSubstitutionError } from './errors.js';
import { PROCEED_PLACEHOLDER } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A login page template and where it came from (for error reporting).
 */
export interface LoginTemplate {
  readonly html: string;
  /** File path, or 'built-in' */
  readonly source: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Built-in Page
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Escapes a value for use inside a double-quoted HTML attribute or text node.
 */
export const escapeHtml = (value: string): string =>
  value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');

/**
 * Builds the built-in login page template, posting to `loginPath`.
 */
export const buildDefaultLoginTemplate = (loginPath: string): LoginTemplate => ({
  source: 'built-in',
  html: `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>Login</title>
  </head>
  <body>
    <form action="${escapeHtml(loginPath)}" method="post">
      <label for="username"><b>Username</b></label>
      <input type="text" id="username" name="username" placeholder="Enter Username" required/>

      <label for="password"><b>Password</b></label>
      <input type="password" id="password" name="password" placeholder="Enter Password" required/>

      <input type="hidden" name="proceed" value="${PROCEED_PLACEHOLDER}"/>

      <button type="submit">Login</button>
    </form>
  </body>
</html>
`,
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation & Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Accepts template HTML only if it carries the proceed placeholder.
 */
export function validateLoginTemplate(
  html: string,
  source: string
): Result<LoginTemplate, TemplateSubstitutionError> {
  if (!html.includes(PROCEED_PLACEHOLDER)) {
    return err(createTemplateSubstitutionError(source));
  }
  return ok({ html, source });
}

/**
 * Renders the challenge page for a proceed path.
 * Every placeholder occurrence is replaced with the escaped path.
 */
export function renderLoginPage(
  template: LoginTemplate,
  proceed: string
): Result<string, TemplateSubstitutionError> {
  if (!template.html.includes(PROCEED_PLACEHOLDER)) {
    return err(createTemplateSubstitutionError(template.source));
  }

  // Replacer function: `$&`-style patterns in the path stay literal.
  const escaped = escapeHtml(proceed);
  return ok(template.html.replaceAll(PROCEED_PLACEHOLDER, () => escaped));
}
