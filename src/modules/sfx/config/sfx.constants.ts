/**
 * Sound Effect Generation Constants
 */

export const SFX_CONSTANTS = {
  // Request defaults (applied when the caller omits a value)
  DEFAULT_DURATION_SECONDS: 5.0,
  DEFAULT_PROMPT_INFLUENCE: 0.3,
  DEFAULT_OUTPUT_FORMAT: 'mp3_44100_128',

  // Retry policy defaults
  DEFAULT_MAX_RETRIES: 3,
  DEFAULT_BACKOFF_FACTOR: 1.0, // seconds

  // Accepted ranges (inclusive), enforced before any API call
  MIN_DURATION_SECONDS: 0.5,
  MAX_DURATION_SECONDS: 22.0,
  MIN_PROMPT_INFLUENCE: 0.0,
  MAX_PROMPT_INFLUENCE: 1.0,

  // Jitter added on top of each backoff delay, as a fraction of the delay
  BACKOFF_JITTER_RATIO: 0.1,

  // Largest delay a Node timer honours; longer ones fire immediately
  MAX_BACKOFF_DELAY_MS: 2 ** 31 - 1,

  // Logging
  TEXT_PREVIEW_LENGTH: 50,
} as const;
