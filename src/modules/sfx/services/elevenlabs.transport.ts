/**
 * ElevenLabs Sound Generation Transport
 * One HTTP call per attempt; retries are the client's concern
 */

import fetch from 'node-fetch';
import { elevenlabsConfig } from '../config';
import { ElevenLabsApiError, GenerationError } from '../errors';
import type { GenerationRequest, SoundGenerationTransport } from '../types';

export interface ElevenLabsTransportOptions {
  apiUrl?: string;
}

/**
 * Read an error response body: parsed JSON when possible, raw text otherwise
 */
async function readErrorBody(response: { text(): Promise<string> }): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function* toByteChunks(body: AsyncIterable<unknown>): AsyncGenerator<Uint8Array> {
  for await (const chunk of body) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else if (typeof chunk === 'string') {
      yield Buffer.from(chunk);
    } else {
      throw new TypeError(`Unexpected chunk type in audio stream: ${typeof chunk}`);
    }
  }
}

/**
 * Accept header for an output format; only the mp3 formats have a fixed type
 */
export function acceptHeaderFor(outputFormat: string): string {
  return outputFormat.startsWith('mp3_') ? 'audio/mpeg' : '*/*';
}

export function buildSoundGenerationUrl(apiUrl: string, outputFormat: string): string {
  const url = new URL(`${apiUrl}${elevenlabsConfig.soundGenerationPath}`);
  url.searchParams.set('output_format', outputFormat);
  return url.toString();
}

/**
 * Create the remote call bound to an API key
 */
export function createElevenLabsTransport(
  apiKey: string,
  options: ElevenLabsTransportOptions = {}
): SoundGenerationTransport {
  const apiUrl = options.apiUrl ?? elevenlabsConfig.apiUrl;

  return async (request: GenerationRequest) => {
    const response = await fetch(buildSoundGenerationUrl(apiUrl, request.outputFormat), {
      method: 'POST',
      headers: {
        Accept: acceptHeaderFor(request.outputFormat),
        'Content-Type': 'application/json',
        'xi-api-key': apiKey,
      },
      body: JSON.stringify({
        text: request.text,
        duration_seconds: request.durationSeconds,
        prompt_influence: request.promptInfluence,
      }),
    });

    if (!response.ok) {
      throw new ElevenLabsApiError(response.status, await readErrorBody(response));
    }

    if (!response.body) {
      throw new GenerationError('ElevenLabs returned an empty response body', {
        statusCode: response.status,
      });
    }

    return toByteChunks(response.body);
  };
}
