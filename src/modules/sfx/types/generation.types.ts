/**
 * Sound Effect Generation Types
 */

/**
 * Fully resolved request sent to the remote API
 */
export interface GenerationRequest {
  text: string;
  durationSeconds: number;
  promptInfluence: number;
  outputFormat: string;
}

/**
 * Optional generation parameters; omitted values fall back to client defaults
 */
export interface SoundEffectOptions {
  durationSeconds?: number;
  promptInfluence?: number;
  outputFormat?: string;
}

export interface SoundEffectRequest extends SoundEffectOptions {
  text: string;
}

/**
 * Audio as delivered by a transport, chunk by chunk
 */
export type AudioChunks = Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

/**
 * Remote generation call. Failures carrying an HTTP status are thrown as
 * ElevenLabsApiError.
 */
export type SoundGenerationTransport = (request: GenerationRequest) => Promise<AudioChunks>;

export interface RetryPolicy {
  maxRetries: number;
  backoffFactor: number; // seconds
}

export interface SFXClientOptions extends Partial<RetryPolicy> {
  transport?: SoundGenerationTransport;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}
