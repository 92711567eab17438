/**
 * Login Page Loader
 *
 * Resolves the login page template once at startup: the configured file when
 * one is set, the built-in page otherwise.
 */

import { readFile } from 'node:fs/promises';

import { err, type Result } from 'neverthrow';

import { createLoginPageUnavailableError, type LoginPageError } from '../../core/errors.js';
import {
  buildDefaultLoginTemplate,
  validateLoginTemplate,
  type LoginTemplate,
} from '../../core/login-page.js';

export interface LoadLoginTemplateOptions {
  /** Template file. Absent = built-in page. */
  loginPagePath?: string | undefined;
  /** Path the built-in form posts to */
  loginPath: string;
}

/**
 * Loads and validates the login page template.
 *
 * @returns the template, LoginPageUnavailableError when the file cannot be read,
 *   or TemplateSubstitutionError when it lacks the `{0}` placeholder
 */
export async function loadLoginTemplate(
  options: LoadLoginTemplateOptions
): Promise<Result<LoginTemplate, LoginPageError>> {
  const { loginPagePath, loginPath } = options;

  if (loginPagePath === undefined || loginPagePath === '') {
    return validateLoginTemplate(buildDefaultLoginTemplate(loginPath).html, 'built-in');
  }

  let html: string;
  try {
    html = await readFile(loginPagePath, 'utf8');
  } catch (error) {
    return err(createLoginPageUnavailableError(loginPagePath, error));
  }

  return validateLoginTemplate(html, loginPagePath);
}
