/**
 * SFX Error Taxonomy
 *
 * Every error this library raises extends SFXError and carries a kind tag.
 * The original failure, when there is one, is kept on `cause`.
 */

import { SFXErrorKind } from '../types';

interface SFXErrorOptions {
  cause?: unknown;
}

interface APIErrorOptions extends SFXErrorOptions {
  statusCode?: number;
}

/**
 * Base error; also used on its own for unexpected failures
 */
export class SFXError extends Error {
  readonly kind: SFXErrorKind;

  constructor(message: string, options: SFXErrorOptions = {}, kind: SFXErrorKind = SFXErrorKind.UNEXPECTED) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * Invalid input. Never retried.
 */
export class ParameterError extends SFXError {
  constructor(message: string, options: SFXErrorOptions = {}) {
    super(message, options, SFXErrorKind.PARAMETER);
  }
}

/**
 * Missing or empty credentials at construction time
 */
export class ConfigurationError extends ParameterError {}

/**
 * Failure reported by the remote API
 */
export class APIError extends SFXError {
  readonly statusCode?: number;

  constructor(message: string, options: APIErrorOptions = {}, kind: SFXErrorKind = SFXErrorKind.API) {
    super(message, options, kind);
    this.statusCode = options.statusCode;
  }

  /**
   * Message prefixed with the HTTP status, when known
   */
  describe(): string {
    return this.statusCode === undefined ? this.message : `(Status ${this.statusCode}) ${this.message}`;
  }
}

/** 401 */
export class AuthenticationError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super(message, { statusCode: 401, ...options }, SFXErrorKind.AUTHENTICATION);
  }
}

/** 403 */
export class PermissionError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super(message, { statusCode: 403, ...options }, SFXErrorKind.PERMISSION);
  }
}

/** 429, once retries are exhausted */
export class RateLimitError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super(message, { statusCode: 429, ...options }, SFXErrorKind.RATE_LIMIT);
  }
}

/** 400, or 5xx once retries are exhausted */
export class GenerationError extends APIError {
  constructor(message: string, options: APIErrorOptions = {}) {
    super(message, options, SFXErrorKind.GENERATION);
  }
}

export function isSFXError(error: unknown): error is SFXError {
  return error instanceof SFXError;
}
