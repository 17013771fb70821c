/**
 * ElevenLabs Configuration
 *
 * Only the API key comes from the environment; the endpoint is fixed.
 */

import { env } from '@/shared/config';

export const elevenlabsConfig = {
  apiKey: env.ELEVENLABS_API_KEY,

  // REST endpoint (production)
  apiUrl: 'https://api.elevenlabs.io/v1',

  // Sound generation resource under apiUrl
  soundGenerationPath: '/sound-generation',
} as const;
