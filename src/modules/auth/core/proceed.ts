/**
 * Proceed path handling.
 *
 * The proceed path is echoed back as a redirect target, so only same-origin
 * relative paths are accepted.
 */

import { DEFAULT_PROCEED } from './types.js';

/**
 * Whether a value is a same-origin relative path: starts with a single '/',
 * no protocol-relative '//' prefix, no backslashes, no control characters.
 */
export const isSafeProceedPath = (value: string): boolean => {
  if (!value.startsWith('/') || value.startsWith('//')) {
    return false;
  }

  if (value.includes('\\')) {
    return false;
  }

  // eslint-disable-next-line no-control-regex -- rejecting control characters is the point
  return !/[\u0000-\u001f\u007f]/.test(value);
};

/**
 * Normalises a user-supplied proceed path, falling back to '/'.
 *
 * @example
 * sanitizeProceed('/dashboard')          // '/dashboard'
 * sanitizeProceed(undefined)             // '/'
 * sanitizeProceed('https://evil.example') // '/'
 */
export const sanitizeProceed = (value: string | undefined): string => {
  if (value === undefined || value === '') {
    return DEFAULT_PROCEED;
  }

  return isSafeProceedPath(value) ? value : DEFAULT_PROCEED;
};
