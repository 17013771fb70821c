/**
 * Shared Configuration
 * Loads the project-root .env and exposes typed environment values
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { loadEnvFile } from './env-file';

/**
 * Project root (this file lives at src/shared/config/)
 */
export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

loadEnvFile(path.join(PROJECT_ROOT, '.env'));

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // ElevenLabs credentials (only from the environment)
  ELEVENLABS_API_KEY: process.env.ELEVENLABS_API_KEY || '',

  // Default directory for generated sound effects
  SFX_TEMP_DIR: process.env.SFX_TEMP_DIR
    ? path.resolve(process.env.SFX_TEMP_DIR)
    : path.join(PROJECT_ROOT, 'mcp_temp_files'),

  // Retry policy overrides (parsed by the sfx module)
  SFX_MAX_RETRIES: process.env.SFX_MAX_RETRIES,
  SFX_BACKOFF_FACTOR: process.env.SFX_BACKOFF_FACTOR,

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  const required: (keyof typeof env)[] = ['ELEVENLABS_API_KEY'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

export { loadEnvFile, decodeEnvFile } from './env-file';
