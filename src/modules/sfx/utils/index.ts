/**
 * SFX Utilities
 */

export {
  classifyStatusCode,
  classifyApiError,
  extractErrorMessage,
  getRetryDelay,
} from './error-classifier';
