/**
 * ElevenLabs Error Classifier
 * Maps API failures to SFX error kinds and retry decisions
 */

import { SFX_CONSTANTS } from '../config';
import { ElevenLabsApiError } from '../errors';
import { SFXErrorKind, type ClassifiedError, type StatusClassification } from '../types';

/**
 * Classify an HTTP status code.
 * 429 and 5xx are transient; everything else is terminal.
 */
export function classifyStatusCode(statusCode: number | undefined): StatusClassification {
  if (statusCode === 401) {
    return { kind: SFXErrorKind.AUTHENTICATION, retryable: false };
  }
  if (statusCode === 403) {
    return { kind: SFXErrorKind.PERMISSION, retryable: false };
  }
  if (statusCode === 429) {
    return { kind: SFXErrorKind.RATE_LIMIT, retryable: true };
  }
  if (statusCode === 400) {
    return { kind: SFXErrorKind.GENERATION, retryable: false };
  }
  if (statusCode !== undefined && statusCode >= 500) {
    return { kind: SFXErrorKind.GENERATION, retryable: true };
  }
  return { kind: SFXErrorKind.API, retryable: false };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a human-readable message out of an API error body.
 * Prefers `detail.message`, then a string `detail`, then the fallback.
 */
export function extractErrorMessage(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    const detail = body.detail;
    if (isRecord(detail) && typeof detail.message === 'string') {
      return detail.message;
    }
    if (typeof detail === 'string') {
      return detail;
    }
  }
  return fallback;
}

/**
 * Classify one failed attempt
 */
export function classifyApiError(error: ElevenLabsApiError): ClassifiedError {
  return {
    ...classifyStatusCode(error.statusCode),
    statusCode: error.statusCode,
    message: extractErrorMessage(error.body, error.message),
    cause: error,
  };
}

/**
 * Backoff before the next attempt, in milliseconds:
 * backoffFactor * 2^attempt seconds, plus up to 10% of that as jitter,
 * capped at the longest delay setTimeout supports.
 */
export function getRetryDelay(attempt: number, backoffFactor: number, random: () => number = Math.random): number {
  const base = backoffFactor * Math.pow(2, attempt);
  const jitter = random() * SFX_CONSTANTS.BACKOFF_JITTER_RATIO * base;
  return Math.min((base + jitter) * 1000, SFX_CONSTANTS.MAX_BACKOFF_DELAY_MS);
}
