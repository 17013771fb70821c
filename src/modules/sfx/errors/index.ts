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
} from './sfx.errors';
export { ElevenLabsApiError } from './elevenlabs-api.error';
