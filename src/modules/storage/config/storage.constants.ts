/**
 * Storage Constants
 */

export const STORAGE_CONSTANTS = {
  // Extension used when none is given and for generated names
  DEFAULT_EXTENSION: '.mp3',

  // Prefix of generated file names: sfx_<uuid>.mp3
  GENERATED_NAME_PREFIX: 'sfx_',

  // First version suffix used on collision: name_v2.mp3
  FIRST_VERSION: 2,
} as const;
