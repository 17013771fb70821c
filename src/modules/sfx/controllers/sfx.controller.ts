/**
 * SFX Controller
 * Public entry point for sound effect generation (the only way other modules
 * reach the SFX client)
 */

import { logger } from '@/shared/utils';
import { elevenlabsConfig, sfxRetryConfig } from '../config';
import { ConfigurationError, SFXError, isSFXError } from '../errors';
import { SFXClient } from '../services';
import type { RetryPolicy, SFXClientOptions, SoundEffectOptions, SoundEffectRequest } from '../types';

export interface SFXControllerConfig extends Partial<RetryPolicy> {
  apiKey: string;
  createClient?: (apiKey: string, options: SFXClientOptions) => SFXClient;
}

export class SFXController {
  constructor(private readonly config: SFXControllerConfig) {}

  /**
   * Build a client from the configured credentials
   *
   * @throws ConfigurationError when ELEVENLABS_API_KEY is not set
   */
  createClient(): SFXClient {
    if (!this.config.apiKey) {
      throw new ConfigurationError('ELEVENLABS_API_KEY is not configured. Please set it in the .env file.');
    }

    const options: SFXClientOptions = {
      maxRetries: this.config.maxRetries,
      backoffFactor: this.config.backoffFactor,
    };

    return this.config.createClient
      ? this.config.createClient(this.config.apiKey, options)
      : new SFXClient(this.config.apiKey, options);
  }

  /**
   * Generate a sound effect. Only the options the caller set are forwarded,
   * so the client's defaults apply to the rest.
   */
  async generateSoundEffect(text: string, options: SoundEffectOptions = {}): Promise<Buffer> {
    const client = this.createClient();

    const request: SoundEffectRequest = { text };
    if (options.durationSeconds !== undefined) {
      request.durationSeconds = options.durationSeconds;
    }
    if (options.promptInfluence !== undefined) {
      request.promptInfluence = options.promptInfluence;
    }
    if (options.outputFormat !== undefined) {
      request.outputFormat = options.outputFormat;
    }

    try {
      return await client.generate(request);
    } catch (error) {
      if (isSFXError(error)) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected error in SFX controller', { error: message });
      throw new SFXError(`An unexpected error occurred: ${message}`, { cause: error });
    }
  }
}

export const sfxController = new SFXController({
  apiKey: elevenlabsConfig.apiKey,
  maxRetries: sfxRetryConfig.maxRetries,
  backoffFactor: sfxRetryConfig.backoffFactor,
});
