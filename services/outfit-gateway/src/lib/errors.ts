/**
 * Errors raised by the recommendation engine.
 *
 * Only context problems are fatal. Empty slots and search bounds are
 * reported as warnings on the result, and malformed wardrobe items are
 * excluded with a diagnostic instead of raising.
 */

export type InvalidContextCode =
  | 'MISSING_WEATHER'
  | 'MALFORMED_WEATHER'
  | 'MISSING_MOOD'
  | 'MALFORMED_MOOD'
  | 'MALFORMED_EVENT'
  | 'MALFORMED_DATE';

export class InvalidContextError extends Error {
  readonly code: InvalidContextCode;
  readonly details: string[];

  constructor(code: InvalidContextCode, message: string, details: string[] = []) {
    super(message);
    this.name = 'InvalidContextError';
    this.code = code;
    this.details = details;
  }
}
