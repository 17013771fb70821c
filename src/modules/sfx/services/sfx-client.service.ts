/**
 * SFX Client
 * Validates a sound effect request, calls the ElevenLabs API and retries
 * transient failures (429, 5xx) with exponential backoff and jitter.
 *
 * Holds only immutable configuration; each generate() call keeps its own
 * attempt counter, so one client can serve concurrent calls.
 */

import { logger } from '@/shared/utils';
import { SFX_CONSTANTS } from '../config';
import {
  APIError,
  AuthenticationError,
  ConfigurationError,
  ElevenLabsApiError,
  GenerationError,
  ParameterError,
  PermissionError,
  RateLimitError,
  SFXError,
  isSFXError,
} from '../errors';
import { classifyApiError, getRetryDelay } from '../utils';
import {
  SFXErrorKind,
  type AudioChunks,
  type ClassifiedError,
  type GenerationRequest,
  type SFXClientOptions,
  type SoundEffectRequest,
  type SoundGenerationTransport,
} from '../types';
import { createElevenLabsTransport } from './elevenlabs.transport';

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function preview(text: string): string {
  return text.substring(0, SFX_CONSTANTS.TEXT_PREVIEW_LENGTH);
}

export class SFXClient {
  readonly maxRetries: number;
  readonly backoffFactor: number;

  private readonly transport: SoundGenerationTransport;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  /**
   * @throws ConfigurationError when the API key is empty
   */
  constructor(apiKey: string, options: SFXClientOptions = {}) {
    if (!apiKey) {
      throw new ConfigurationError('API key cannot be empty.');
    }

    this.maxRetries = options.maxRetries ?? SFX_CONSTANTS.DEFAULT_MAX_RETRIES;
    this.backoffFactor = options.backoffFactor ?? SFX_CONSTANTS.DEFAULT_BACKOFF_FACTOR;
    this.transport = options.transport ?? createElevenLabsTransport(apiKey);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;

    logger.debug('SFX client initialized', {
      maxRetries: this.maxRetries,
      backoffFactor: this.backoffFactor,
    });
  }

  /**
   * Generate a sound effect and return the complete audio
   */
  async generate(request: SoundEffectRequest): Promise<Buffer> {
    const resolved: GenerationRequest = {
      text: request.text,
      durationSeconds: request.durationSeconds ?? SFX_CONSTANTS.DEFAULT_DURATION_SECONDS,
      promptInfluence: request.promptInfluence ?? SFX_CONSTANTS.DEFAULT_PROMPT_INFLUENCE,
      outputFormat: request.outputFormat ?? SFX_CONSTANTS.DEFAULT_OUTPUT_FORMAT,
    };

    this.validate(resolved);

    // A negative maxRetries still gets one attempt
    const totalAttempts = Math.max(this.maxRetries, 0) + 1;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      try {
        logger.info('Generating sound effect', {
          attempt: attempt + 1,
          totalAttempts,
          preview: preview(resolved.text),
        });

        const audio = await this.collect(await this.transport(resolved));

        logger.info('Sound effect generated', { attempts: attempt + 1, bytes: audio.length });
        return audio;
      } catch (error) {
        if (!(error instanceof ElevenLabsApiError)) {
          throw this.wrapUnexpected(error);
        }

        const classified = classifyApiError(error);
        logger.warn('ElevenLabs API error', {
          statusCode: classified.statusCode,
          kind: classified.kind,
          attempt: attempt + 1,
          totalAttempts,
          message: classified.message,
        });

        if (classified.retryable && attempt < totalAttempts - 1) {
          const delayMs = getRetryDelay(attempt, this.backoffFactor, this.random);
          logger.warn(`Retrying in ${(delayMs / 1000).toFixed(2)}s`, { statusCode: classified.statusCode });
          await this.sleep(delayMs);
          continue;
        }

        throw this.toTerminalError(classified, totalAttempts);
      }
    }

    // Unreachable: the last attempt always returns or throws
    throw new GenerationError(`Failed to generate sound effect after ${totalAttempts} attempts`);
  }

  private validate(request: GenerationRequest): void {
    const { durationSeconds, promptInfluence, text } = request;
    const {
      MIN_DURATION_SECONDS,
      MAX_DURATION_SECONDS,
      MIN_PROMPT_INFLUENCE,
      MAX_PROMPT_INFLUENCE,
    } = SFX_CONSTANTS;

    // Written as negated ranges so NaN is rejected too
    if (!(durationSeconds >= MIN_DURATION_SECONDS && durationSeconds <= MAX_DURATION_SECONDS)) {
      throw this.parameterError(
        `Duration must be between ${MIN_DURATION_SECONDS} and ${MAX_DURATION_SECONDS} seconds, got ${durationSeconds}.`
      );
    }
    if (!(promptInfluence >= MIN_PROMPT_INFLUENCE && promptInfluence <= MAX_PROMPT_INFLUENCE)) {
      throw this.parameterError(
        `Prompt influence must be between ${MIN_PROMPT_INFLUENCE} and ${MAX_PROMPT_INFLUENCE}, got ${promptInfluence}.`
      );
    }
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw this.parameterError('Text prompt cannot be empty or whitespace only.');
    }
  }

  private parameterError(message: string): ParameterError {
    logger.error(message);
    return new ParameterError(message);
  }

  private async collect(chunks: AudioChunks): Promise<Buffer> {
    const parts: Uint8Array[] = [];
    for await (const chunk of chunks) {
      parts.push(chunk);
    }
    return Buffer.concat(parts);
  }

  private wrapUnexpected(error: unknown): SFXError {
    if (isSFXError(error)) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error('Unexpected error during sound effect generation', {
      error: message,
    });
    return new SFXError(`An unexpected error occurred: ${message}`, { cause: error });
  }

  private toTerminalError(classified: ClassifiedError, totalAttempts: number): APIError {
    const { statusCode, message, cause } = classified;
    const options = { statusCode, cause };

    switch (classified.kind) {
      case SFXErrorKind.AUTHENTICATION:
        return new AuthenticationError(`Invalid API key or authentication failed: ${message}`, options);
      case SFXErrorKind.PERMISSION:
        return new PermissionError(`Permission denied. API key may lack permissions: ${message}`, options);
      case SFXErrorKind.RATE_LIMIT:
        return new RateLimitError(`Rate limit exceeded after ${totalAttempts} attempts: ${message}`, options);
      case SFXErrorKind.GENERATION:
        return classified.retryable
          ? new GenerationError(`Server error (${statusCode}) after ${totalAttempts} attempts: ${message}`, options)
          : new GenerationError(`Bad request to API (e.g., invalid prompt or parameters): ${message}`, options);
      default:
        return new APIError(`Unhandled API error (status: ${statusCode ?? 'unknown'}): ${message}`, options);
    }
  }
}
