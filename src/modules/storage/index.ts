/**
 * Storage Module Exports
 */

export {
  audioFileService,
  AudioFileService,
  splitFilename,
  versionedFilename,
  type SaveAudioOptions,
} from './services/audio-file.service';
