/**
 * ElevenLabs Transport Tests
 * node-fetch is mocked; responses are real node-fetch Response objects
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Readable } from 'stream';
import fetch, { Response } from 'node-fetch';
import {
  acceptHeaderFor,
  buildSoundGenerationUrl,
  createElevenLabsTransport,
} from '@/modules/sfx/services/elevenlabs.transport';
import { ElevenLabsApiError } from '@/modules/sfx/errors';
import type { AudioChunks, GenerationRequest } from '@/modules/sfx/types';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const mockFetch = vi.mocked(fetch);

const request: GenerationRequest = {
  text: 'Footsteps on gravel',
  durationSeconds: 3,
  promptInfluence: 0.5,
  outputFormat: 'mp3_44100_128',
};

async function collect(chunks: AudioChunks): Promise<string> {
  const parts: Uint8Array[] = [];
  for await (const chunk of chunks) {
    parts.push(chunk);
  }
  return Buffer.concat(parts).toString();
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('buildSoundGenerationUrl', () => {
  it('should append the sound generation path and output format', () => {
    expect(buildSoundGenerationUrl('https://api.elevenlabs.io/v1', 'pcm_16000')).toBe(
      'https://api.elevenlabs.io/v1/sound-generation?output_format=pcm_16000'
    );
  });
});

describe('acceptHeaderFor', () => {
  it.each([
    ['mp3_44100_128', 'audio/mpeg'],
    ['mp3_22050_32', 'audio/mpeg'],
    ['pcm_16000', '*/*'],
    ['ulaw_8000', '*/*'],
  ])('should send %s with Accept %s', (outputFormat, accept) => {
    expect(acceptHeaderFor(outputFormat)).toBe(accept);
  });
});

describe('createElevenLabsTransport', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should POST the request with the API key header and snake_case body', async () => {
    mockFetch.mockResolvedValue(new Response(Buffer.from('audio'), { status: 200 }));
    const transport = createElevenLabsTransport('test-secret');

    await collect(await transport(request));

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.elevenlabs.io/v1/sound-generation?output_format=mp3_44100_128',
      {
        method: 'POST',
        headers: {
          Accept: 'audio/mpeg',
          'Content-Type': 'application/json',
          'xi-api-key': 'test-secret',
        },
        body: JSON.stringify({
          text: 'Footsteps on gravel',
          duration_seconds: 3,
          prompt_influence: 0.5,
        }),
      }
    );
  });

  it('should honour a custom API URL', async () => {
    mockFetch.mockResolvedValue(new Response(Buffer.from('audio'), { status: 200 }));
    const transport = createElevenLabsTransport('test-secret', { apiUrl: 'http://localhost:9999/v1' });

    await collect(await transport(request));

    expect(mockFetch.mock.calls[0][0]).toBe(
      'http://localhost:9999/v1/sound-generation?output_format=mp3_44100_128'
    );
  });

  it('should not ask for mpeg when requesting PCM', async () => {
    mockFetch.mockResolvedValue(new Response(Buffer.from('pcm'), { status: 200 }));
    const transport = createElevenLabsTransport('test-secret');

    await collect(await transport({ ...request, outputFormat: 'pcm_16000' }));

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.elevenlabs.io/v1/sound-generation?output_format=pcm_16000',
      expect.objectContaining({ headers: expect.objectContaining({ Accept: '*/*' }) })
    );
  });

  it('should yield the response body chunk by chunk', async () => {
    const body = Readable.from([Buffer.from('RIFF'), Buffer.from('data'), Buffer.from('!')]);
    mockFetch.mockResolvedValue(new Response(body, { status: 200 }));
    const transport = createElevenLabsTransport('test-secret');

    expect(await collect(await transport(request))).toBe('RIFFdata!');
  });

  it('should throw ElevenLabsApiError with a parsed JSON body', async () => {
    const payload = { detail: { status: 'invalid_api_key', message: 'Invalid API key' } };
    mockFetch.mockResolvedValue(
      new Response(JSON.stringify(payload), { status: 401, headers: { 'Content-Type': 'application/json' } })
    );
    const transport = createElevenLabsTransport('test-secret');

    const error = await captureError(transport(request));

    expect(error).toBeInstanceOf(ElevenLabsApiError);
    expect(error).toMatchObject({ statusCode: 401, body: payload });
  });

  it('should keep a non-JSON error body as text', async () => {
    mockFetch.mockResolvedValue(new Response('Service Unavailable', { status: 503 }));
    const transport = createElevenLabsTransport('test-secret');

    const error = await captureError(transport(request));

    expect(error).toMatchObject({
      statusCode: 503,
      body: 'Service Unavailable',
      message: 'status_code: 503, body: Service Unavailable',
    });
  });

  it('should leave the body undefined when the error response is empty', async () => {
    mockFetch.mockResolvedValue(new Response('', { status: 429 }));
    const transport = createElevenLabsTransport('test-secret');

    const error = await captureError(transport(request));

    expect(error).toBeInstanceOf(ElevenLabsApiError);
    expect(error).toMatchObject({ statusCode: 429, message: 'status_code: 429, body: none' });
  });

  it('should let network failures through unclassified', async () => {
    const networkError = new Error('getaddrinfo ENOTFOUND api.elevenlabs.io');
    mockFetch.mockRejectedValue(networkError);
    const transport = createElevenLabsTransport('test-secret');

    await expect(transport(request)).rejects.toBe(networkError);
  });
});
