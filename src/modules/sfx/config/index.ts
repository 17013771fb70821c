export { SFX_CONSTANTS } from './sfx.constants';
export { sfxRetryConfig } from './retry.config';
export { elevenlabsConfig } from './elevenlabs.config';
