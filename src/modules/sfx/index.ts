/**
 * SFX Module Exports
 */

// Public API (Controller)
export { sfxController, SFXController } from './controllers/sfx.controller';
export type { SFXControllerConfig } from './controllers/sfx.controller';

// Client, for callers that manage their own instance
export { SFXClient } from './services';

// Error taxonomy
export {
  SFXError,
  ParameterError,
  ConfigurationError,
  APIError,
  AuthenticationError,
  PermissionError,
  RateLimitError,
  GenerationError,
  isSFXError,
} from './errors';

export { SFXErrorKind } from './types';
export type { SoundEffectOptions, SoundEffectRequest, RetryPolicy, SFXClientOptions } from './types';
