/**
 * SFX Retry Configuration
 */

import { env } from '@/shared/config';
import { SFX_CONSTANTS } from './sfx.constants';

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const sfxRetryConfig = {
  // Retries after the first attempt (3 → 4 attempts in total)
  maxRetries: Math.trunc(readNumber(env.SFX_MAX_RETRIES, SFX_CONSTANTS.DEFAULT_MAX_RETRIES)),

  // Base delay in seconds; attempt n waits backoffFactor * 2^n plus jitter
  backoffFactor: readNumber(env.SFX_BACKOFF_FACTOR, SFX_CONSTANTS.DEFAULT_BACKOFF_FACTOR),
} as const;
