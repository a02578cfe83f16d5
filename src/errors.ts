import { ErrorCodes, type ErrorCode } from './types.js';

/**
 * Base error for every failure the poster reports. The `code` identifies the
 * failure kind; the underlying error, if any, is kept in `cause`.
 */
export class PosterError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PosterError';
    this.code = code;
  }
}

/**
 * Product page could not be fetched after all retries
 */
export class FetchFailedError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.FETCH_FAILED, message, options);
    this.name = 'FetchFailedError';
  }
}

/**
 * No locator in a fallback list matched before its timeout
 */
export class ElementNotFoundError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.ELEMENT_NOT_FOUND, message, options);
    this.name = 'ElementNotFoundError';
  }
}

/**
 * Login or ROOM submit button could not be located
 */
export class SubmitControlNotFoundError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SUBMIT_CONTROL_NOT_FOUND, message, options);
    this.name = 'SubmitControlNotFoundError';
  }
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
