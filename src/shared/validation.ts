/**
 * Input validation helpers shared by the engine and the HTTP layer
 */

export const MAX_MESSAGE_LENGTH = 10000;

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.:@-]{1,128}$/;

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = MAX_MESSAGE_LENGTH): string {
  return input
    .trim()
    // Remove control characters except newlines
    .replace(/[\x00-\x09\x0B\x0C\x0E-\x1F\x7F]/g, '')
    // Limit length
    .substring(0, maxLength);
}

/**
 * Validate message content
 * - Not empty after sanitizing
 * - Contains printable characters
 */
export function isValidMessage(message: string): boolean {
  const sanitized = sanitizeInput(message);

  if (sanitized.length === 0) {
    return false;
  }

  return /[\p{L}\p{N}]/u.test(sanitized);
}

/**
 * User and conversation ids end up inside cache keys, so no whitespace or slashes.
 */
export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}
