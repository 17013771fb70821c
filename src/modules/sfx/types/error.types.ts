/**
 * SFX Error Types
 */

export enum SFXErrorKind {
  PARAMETER = 'parameter',
  AUTHENTICATION = 'authentication',
  PERMISSION = 'permission',
  RATE_LIMIT = 'rate_limit',
  GENERATION = 'generation',
  API = 'api',
  UNEXPECTED = 'unexpected',
}

/**
 * Result of mapping a status code to an error kind
 */
export interface StatusClassification {
  kind: SFXErrorKind;
  retryable: boolean;
}

/**
 * One failed attempt against the remote API, after classification
 */
export interface ClassifiedError extends StatusClassification {
  statusCode?: number;
  message: string;
  cause: unknown;
}
